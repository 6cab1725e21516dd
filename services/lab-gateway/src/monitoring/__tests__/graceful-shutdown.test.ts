import { describe, expect, it, vi } from 'vitest';
import { GracefulShutdown } from '../graceful-shutdown.js';

describe('GracefulShutdown', () => {
  it('runs cleanup tasks in registration order and exits cleanly', async () => {
    const exit = vi.fn<(code: number) => void>();
    const order: string[] = [];
    const shutdown = new GracefulShutdown({ exit });
    shutdown.addCleanupTask('http-server', async () => {
      order.push('http-server');
    });
    shutdown.addCleanupTask('event-sink', async () => {
      order.push('event-sink');
    });

    await shutdown.shutdown('SIGTERM');

    expect(order).toEqual(['http-server', 'event-sink']);
    expect(exit).toHaveBeenCalledWith(0);
    expect(shutdown.isShuttingDownInProgress()).toBe(true);
  });

  it('keeps going after a failing task and exits with 1', async () => {
    const exit = vi.fn<(code: number) => void>();
    const later = vi.fn(async () => {});
    const shutdown = new GracefulShutdown({ exit });
    shutdown.addCleanupTask('http-server', async () => {
      throw new Error('close failed');
    });
    shutdown.addCleanupTask('event-sink', later);

    await shutdown.shutdown('SIGINT');

    expect(later).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('exits with 1 when shutting down because of an error', async () => {
    const exit = vi.fn<(code: number) => void>();

    await new GracefulShutdown({ exit }).shutdown('uncaughtException', new Error('boom'));

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('ignores a second shutdown request', async () => {
    const exit = vi.fn<(code: number) => void>();
    const task = vi.fn(async () => {});
    const shutdown = new GracefulShutdown({ exit });
    shutdown.addCleanupTask('http-server', task);

    await Promise.all([shutdown.shutdown('SIGTERM'), shutdown.shutdown('SIGTERM')]);

    expect(task).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledOnce();
  });

  it('forces exit when cleanup outlives the timeout', async () => {
    const exit = vi.fn<(code: number) => void>();
    const shutdown = new GracefulShutdown({ exit, timeout: 20 });
    shutdown.addCleanupTask('stuck', () => new Promise<void>((resolve) => setTimeout(resolve, 100)));

    await shutdown.shutdown('SIGTERM');

    expect(exit).toHaveBeenNthCalledWith(1, 1);
  });
});
