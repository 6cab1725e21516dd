import { describe, expect, it } from 'vitest';
import { parseExecutionRequest, type ModelPolicy } from '../execution.js';
import { ClientInputError } from '../../../types/errors.js';

const policy: ModelPolicy = { allowedModels: ['mistral7b', 'llama3', 'phi3'], defaultModel: 'mistral7b' };

function rejection(body: unknown): ClientInputError {
  try {
    parseExecutionRequest(body, policy);
  } catch (error: unknown) {
    if (error instanceof ClientInputError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the body to be rejected');
}

describe('parseExecutionRequest', () => {
  it('accepts a minimal simple request', () => {
    expect(
      parseExecutionRequest({ prompt: 'Name 3 prime numbers', model: 'mistral7b', execution_type: 'simple' }, policy)
    ).toEqual({ prompt: 'Name 3 prime numbers', model: 'mistral7b', execution_type: 'simple' });
  });

  it('fills in the default model and drops null optionals', () => {
    const request = parseExecutionRequest(
      { prompt: 'Audit', execution_type: 'orchestrator', agents: ['research_agent'], tools: null, verbose: true },
      policy
    );

    expect(request.model).toBe('mistral7b');
    expect(request.agents).toEqual(['research_agent']);
    expect(request.tools).toBeUndefined();
    expect(request.verbose).toBe(true);
  });

  it('reports a missing prompt', () => {
    const error = rejection({ model: 'mistral7b', execution_type: 'simple' });

    expect(error.reason).toBe('missing_field');
    expect(error.message).toBe('prompt is required');
    expect(error.statusCode).toBe(400);
  });

  it('reports a missing execution_type as a missing field', () => {
    const error = rejection({ prompt: 'hi' });

    expect(error.reason).toBe('missing_field');
    expect(error.message).toBe('execution_type is required');
  });

  it('rejects a whitespace-only prompt', () => {
    const error = rejection({ prompt: '   ', execution_type: 'simple' });

    expect(error.reason).toBe('invalid_field');
    expect(error.message).toBe('prompt: prompt must not be empty');
  });

  it('rejects an unknown execution type', () => {
    const error = rejection({ prompt: 'hi', execution_type: 'challenge' });

    expect(error.reason).toBe('unsupported_execution_type');
    expect(error.issues.map((issue) => issue.path)).toEqual([['execution_type']]);
  });

  it('rejects out-of-range tuning fields', () => {
    const error = rejection({ prompt: 'hi', execution_type: 'simple', temperature: 2, max_tokens: 8 });

    expect(error.reason).toBe('invalid_field');
    expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['temperature', 'max_tokens']);
  });

  it('rejects a model outside the allow list', () => {
    const error = rejection({ prompt: 'hi', model: 'gpt4', execution_type: 'simple' });

    expect(error.reason).toBe('model_not_allowed');
    expect(error.message).toBe('model "gpt4" is not allowed; expected one of: mistral7b, llama3, phi3');
  });

  it('rejects a body that is not an object', () => {
    const error = rejection(null);

    expect(error.reason).toBe('invalid_field');
    expect(error.message).toBe('body: Expected object, received null');
  });
});
