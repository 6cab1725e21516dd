import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLabClient, LAB_ENDPOINTS } from '../lab-client.js';
import {
  LabMalformedResponseError,
  LabUnreachableError,
  LabUpstreamError,
} from '../../types/errors.js';
import { refusedUrl, startFakeLab, testConfig, type FakeLab } from '../../__tests__/helpers/fake-lab.js';

describe('HttpLabClient', () => {
  let lab: FakeLab;

  beforeEach(async () => {
    lab = await startFakeLab();
  });

  afterEach(async () => {
    await lab.close();
  });

  describe('callInference', () => {
    it('posts the payload and forwards the correlation id', async () => {
      lab.on('POST', LAB_ENDPOINTS.inference, (_req, res) => {
        res.json({ text: '2, 3, 5', metrics: { latency_ms: 120 } });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const response = await client.callInference({ prompt: 'Name 3 prime numbers', model: 'mistral7b' }, { requestId: 'req-42' });

      expect(response).toEqual({ text: '2, 3, 5', metrics: { latency_ms: 120 } });
      expect(lab.calls).toEqual([
        {
          method: 'POST',
          path: '/inference/',
          body: { prompt: 'Name 3 prime numbers', model: 'mistral7b' },
          requestId: 'req-42',
        },
      ]);
    });

    it('raises LabUpstreamError on a non-2xx answer without retrying', async () => {
      lab.on('POST', LAB_ENDPOINTS.inference, (_req, res) => {
        res.status(500).json({ detail: 'model crashed' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const error = await client.callInference({ prompt: 'hi', model: 'mistral7b' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LabUpstreamError);
      expect(error).toMatchObject({
        upstreamStatus: 500,
        message: 'Lab Service returned HTTP 500 for /inference/: model crashed',
      });
      expect(lab.calls).toHaveLength(1);
    });

    it('raises LabMalformedResponseError when the body does not match', async () => {
      lab.on('POST', LAB_ENDPOINTS.inference, (_req, res) => {
        res.json({ answer: 'no text field' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const error = await client.callInference({ prompt: 'hi', model: 'mistral7b' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LabMalformedResponseError);
      expect(error).toMatchObject({ message: 'Lab Service sent a malformed response for /inference/: text' });
    });

    it('does not retry a call that timed out', async () => {
      lab.on('POST', LAB_ENDPOINTS.inference, async (_req, res) => {
        await new Promise((resolve) => setTimeout(resolve, 300));
        res.json({ text: 'too late' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url, LAB_REQUEST_TIMEOUT_MS: '50' }));

      const error = await client.callInference({ prompt: 'hi', model: 'mistral7b' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LabUnreachableError);
      expect(error).toMatchObject({ timedOut: true, attempts: 1 });
      expect(lab.calls).toHaveLength(1);
    });
  });

  describe('callOrchestrate', () => {
    it('accepts non-numeric metric values', async () => {
      lab.on('POST', LAB_ENDPOINTS.orchestrate, (_req, res) => {
        res.json({
          nodes: [{ name: 'analyzer', status: 'done' }],
          metrics: { total_time: 1.2, models_used: ['mistral7b'], tokens_generated: null },
        });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const response = await client.callOrchestrate({ prompt: 'Audit', model: 'mistral7b', agents: [], tools: [] });

      expect(response.metrics).toEqual({ total_time: 1.2, models_used: ['mistral7b'], tokens_generated: null });
    });

    it('maps legacy node statuses onto the current ones', async () => {
      lab.on('POST', LAB_ENDPOINTS.orchestrate, (_req, res) => {
        res.json({
          nodes: [
            { name: 'analyzer', status: 'completed', output: 'ok' },
            { name: 'executor', status: 'error', output: null },
          ],
        });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const response = await client.callOrchestrate({
        prompt: 'Audit',
        model: 'mistral7b',
        agents: [],
        tools: [],
      });

      expect(response.nodes.map((node) => node.status)).toEqual(['done', 'failed']);
      expect(lab.calls[0]?.body).toEqual({ prompt: 'Audit', model: 'mistral7b', agents: [], tools: [] });
    });

    it('rejects a node list that is not a list', async () => {
      lab.on('POST', LAB_ENDPOINTS.orchestrate, (_req, res) => {
        res.json({ nodes: 'analyzer' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      await expect(
        client.callOrchestrate({ prompt: 'Audit', model: 'mistral7b', agents: [], tools: [] })
      ).rejects.toBeInstanceOf(LabMalformedResponseError);
    });
  });

  describe('connection failures', () => {
    it('retries once when the connection is refused', async () => {
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: await refusedUrl() }));

      const error = await client.callInference({ prompt: 'hi', model: 'mistral7b' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LabUnreachableError);
      expect(error).toMatchObject({
        attempts: 2,
        timedOut: false,
        message: 'Lab Service is unreachable at /inference/ (ECONNREFUSED)',
      });
    });

    it('gives up after one attempt when retries are disabled', async () => {
      const client = createLabClient(
        testConfig({ LAB_SERVICE_URL: await refusedUrl(), LAB_RETRY_ON_CONNECT_ERROR: 'false' })
      );

      const error = await client
        .callOrchestrate({ prompt: 'hi', model: 'mistral7b', agents: [], tools: [] })
        .catch((caught: unknown) => caught);

      expect(error).toMatchObject({ attempts: 1, endpoint: '/orchestrate/' });
    });
  });

  describe('probe', () => {
    it('treats 405 on a POST-only route as reachable', async () => {
      lab.on('GET', LAB_ENDPOINTS.inference, (_req, res) => {
        res.status(405).json({ detail: 'Method Not Allowed' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const probe = await client.probe('inference');

      expect(probe).toMatchObject({ target: 'inference', reachable: true, statusCode: 405 });
      expect(probe.error).toBeUndefined();
    });

    it('treats a 404 as unreachable', async () => {
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const probe = await client.probe('orchestrate');

      expect(probe).toEqual({
        target: 'orchestrate',
        reachable: false,
        latencyMs: probe.latencyMs,
        statusCode: 404,
        error: 'HTTP 404',
      });
    });

    it('treats a 200 as reachable', async () => {
      lab.on('GET', LAB_ENDPOINTS.orchestrate, (_req, res) => {
        res.json({ status: 'ready' });
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      await expect(client.probe('orchestrate')).resolves.toMatchObject({ reachable: true, statusCode: 200 });
    });

    it('treats a 5xx answer as unreachable', async () => {
      lab.on('GET', LAB_ENDPOINTS.orchestrate, (_req, res) => {
        res.status(503).end();
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      const probe = await client.probe('orchestrate');

      expect(probe).toMatchObject({ reachable: false, statusCode: 503, error: 'HTTP 503' });
    });

    it('reports a refused connection without throwing', async () => {
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: await refusedUrl() }));

      const probe = await client.probe('inference');

      expect(probe).toMatchObject({ reachable: false, error: 'ECONNREFUSED' });
      expect(probe.statusCode).toBeUndefined();
    });
  });

  describe('listModels', () => {
    it('returns the models the Lab Service serves', async () => {
      lab.on('GET', LAB_ENDPOINTS.models, (_req, res) => {
        res.json([{ key: 'mistral7b', name: 'Mistral 7B' }]);
      });
      const client = createLabClient(testConfig({ LAB_SERVICE_URL: lab.url }));

      await expect(client.listModels()).resolves.toEqual([{ key: 'mistral7b', name: 'Mistral 7B' }]);
    });
  });
});
