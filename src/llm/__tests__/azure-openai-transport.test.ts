import OpenAI from 'openai';
import { ChatRequestError } from '../../core/errors.js';
import { classifyTransportError } from '../providers/azure-openai-transport.js';

function apiError(status: number, message = 'failed'): InstanceType<typeof OpenAI.APIError> {
  return new OpenAI.APIError(status, { message }, undefined, undefined);
}

describe('classifyTransportError', () => {
  test('429 backs off exponentially', () => {
    expect(classifyTransportError(apiError(429), 'gpt-4o')).toEqual({
      code: 'rate-limit',
      message: 'Rate limited (HTTP 429)',
      status: 429,
      backoff: 'exponential',
    });
  });

  test('401 and 404 are not retried', () => {
    expect(classifyTransportError(apiError(401), 'gpt-4o')).toEqual({
      code: 'authentication',
      message: 'Authentication failed (HTTP 401): check AZURE_OPENAI_KEY',
      status: 401,
      backoff: null,
    });
    expect(classifyTransportError(apiError(404), 'gpt-4o')).toEqual({
      code: 'deployment-not-found',
      message: 'Deployment not found (HTTP 404): gpt-4o',
      status: 404,
      backoff: null,
    });
  });

  test('other statuses carry a body snippet', () => {
    expect(classifyTransportError(apiError(500, 'boom'), 'gpt-4o')).toEqual({
      code: 'http',
      message: 'HTTP 500: {"message":"boom"}',
      status: 500,
      backoff: null,
    });
  });

  test('timeouts and connection failures back off linearly', () => {
    expect(classifyTransportError(new OpenAI.APIConnectionTimeoutError(), 'gpt-4o')).toEqual({
      code: 'timeout',
      message: 'Request timed out',
      backoff: 'linear',
    });
    expect(
      classifyTransportError(new OpenAI.APIConnectionError({ message: 'socket closed' }), 'gpt-4o')
    ).toEqual({ code: 'connection', message: 'Connection error: socket closed', backoff: 'linear' });
  });

  test('plain errors are matched by name and message', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(classifyTransportError(abort, 'd').code).toBe('timeout');
    expect(classifyTransportError(new Error('connect ECONNREFUSED 127.0.0.1:443'), 'd')).toEqual({
      code: 'connection',
      message: 'Connection error: connect ECONNREFUSED 127.0.0.1:443',
      backoff: 'linear',
    });
    expect(classifyTransportError(new Error('weird'), 'd')).toEqual({
      code: 'unknown',
      message: 'weird',
      backoff: null,
    });
    expect(classifyTransportError('text', 'd')).toEqual({ code: 'unknown', message: 'text', backoff: null });
  });

  test('chat request errors keep their code', () => {
    expect(classifyTransportError(new ChatRequestError('busy', 'rate-limit', 429), 'd')).toEqual({
      code: 'rate-limit',
      message: 'busy',
      status: 429,
      backoff: 'exponential',
    });
    expect(classifyTransportError(new ChatRequestError('nope', 'http', 500), 'd').backoff).toBeNull();
  });
});
