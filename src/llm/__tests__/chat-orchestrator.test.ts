import OpenAI from 'openai';
import { Deadline } from '../../core/concurrency.js';
import {
  ChatOrchestrator,
  maybeEscalateTemperature,
  maybeEscalateTokens,
  type ChatOrchestratorOptions,
} from '../chat-orchestrator.js';
import { FakeChatTransport, completion, failure, type ScriptedStep } from './fake-transport.js';

function httpError(status: number): InstanceType<typeof OpenAI.APIError> {
  return new OpenAI.APIError(status, { message: `status ${status}` }, undefined, undefined);
}

function setup(steps: ScriptedStep[], overrides: Partial<ChatOrchestratorOptions> = {}) {
  const transport = new FakeChatTransport(steps);
  const delays: number[] = [];
  let clock = 0;
  const orchestrator = new ChatOrchestrator({
    transport,
    modelFamily: 'standard',
    maxOutputTokens: 500,
    maxOutputTokensCeiling: 1200,
    temperature: 0.2,
    topP: 0.9,
    temperatureIncrement: 0.1,
    temperatureMax: 0.7,
    adaptTemperature: true,
    allowEscalation: true,
    maxRetries: 3,
    retryBaseDelayMs: 1000,
    requestTimeoutMs: 30000,
    sleep: async (ms) => {
      delays.push(ms);
      clock += ms;
    },
    now: () => clock,
    ...overrides,
  });
  return { orchestrator, transport, delays, now: () => clock };
}

describe('maybeEscalateTokens', () => {
  test.each([
    [500, 1200, 750],
    [60, 1200, 110],
    [1000, 1200, 1200],
    [1200, 1200, 1200],
    [1500, 1200, 1500],
  ])('%i (ceiling %i) -> %i', (current, ceiling, next) => {
    expect(maybeEscalateTokens(current, ceiling)).toBe(next);
  });

  test('never decreases', () => {
    for (let current = 1; current <= 1300; current += 7) {
      expect(maybeEscalateTokens(current, 1200)).toBeGreaterThanOrEqual(current);
    }
  });
});

describe('maybeEscalateTemperature', () => {
  test('adds the increment, rounded and capped', () => {
    expect(maybeEscalateTemperature(0.2, 0.1, 0.7)).toBe(0.3);
    expect(maybeEscalateTemperature(0.65, 0.1, 0.7)).toBe(0.7);
    expect(maybeEscalateTemperature(0.7, 0.1, 0.7)).toBe(0.7);
    expect(maybeEscalateTemperature(null, 0.1, 0.7)).toBeNull();
  });
});

describe('ChatOrchestrator', () => {
  test('retries rate limits, then escalates a truncated answer', async () => {
    const { orchestrator, transport, delays } = setup([
      failure(httpError(429)),
      failure(httpError(429)),
      completion('AppRequests | take', 'length'),
      completion('AppRequests | take 10', 'stop'),
    ]);

    const result = await orchestrator.run(orchestrator.createRequest('system', 'user'));

    expect(result.content).toBe('AppRequests | take 10');
    expect(result.error).toBeNull();
    expect(result.attempts).toBe(3);
    expect(result.escalated).toBe(true);
    expect(result.finishReason).toBe('stop');
    expect(delays).toEqual([1000, 2000]);
    expect(result.metadata).toMatchObject({
      purpose: 'translate',
      deployment: 'test-deployment',
      initialMaxTokens: 500,
      finalMaxTokens: 750,
      initialTemperature: 0.2,
      finalTemperature: 0.3,
      escalationAttempts: 1,
      errorCode: null,
    });
    expect(transport.payloads[3]).toMatchObject({ max_tokens: 750, temperature: 0.3, top_p: 0.9 });
  });

  test.each([
    [401, 'authentication', 'Authentication failed (HTTP 401): check AZURE_OPENAI_KEY'],
    [404, 'deployment-not-found', 'Deployment not found (HTTP 404): test-deployment'],
    [500, 'http', 'HTTP 500: {"message":"status 500"}'],
  ])('HTTP %i fails fast', async (status, code, message) => {
    const { orchestrator, transport, delays } = setup([failure(httpError(status)), completion('never sent')]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(result.content).toBeNull();
    expect(result.errorCode).toBe(code);
    expect(result.error).toBe(message);
    expect(result.attempts).toBe(1);
    expect(transport.calls).toBe(1);
    expect(delays).toEqual([]);
  });

  test('timeouts back off linearly until retries run out', async () => {
    const timeout = () => failure(new OpenAI.APIConnectionTimeoutError());
    const { orchestrator, delays } = setup([timeout(), timeout(), timeout(), timeout()], { maxRetries: 4 });

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(delays).toEqual([1000, 2000, 3000]);
    expect(result.attempts).toBe(4);
    expect(result.errorCode).toBe('timeout');
    expect(result.error).toBe('Request timed out after 4 attempts');
  });

  test('rate limits back off exponentially until retries run out', async () => {
    const limited = () => failure(httpError(429));
    const { orchestrator, delays } = setup([limited(), limited(), limited(), limited()], { maxRetries: 4 });

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(delays).toEqual([1000, 2000, 4000]);
    expect(result.error).toBe('Rate limited (HTTP 429) after 4 attempts');
  });

  test('keeps the truncated answer when the escalated request fails', async () => {
    const { orchestrator } = setup([completion('AppRequests | take', 'length'), failure(httpError(401))]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(result.content).toBe('AppRequests | take');
    expect(result.finishReason).toBe('length');
    expect(result.errorCode).toBeNull();
    expect(result.escalated).toBe(true);
    expect(result.metadata.escalationError).toBe('Authentication failed (HTTP 401): check AZURE_OPENAI_KEY');
  });

  test('does not escalate when disabled for the call', async () => {
    const { orchestrator, transport } = setup([completion('AppRequests | take', 'length')]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'), { allowEscalation: false });

    expect(transport.calls).toBe(1);
    expect(result.escalated).toBe(false);
    expect(result.content).toBe('AppRequests | take');
  });

  test('does not escalate past the ceiling', async () => {
    const { orchestrator, transport } = setup([completion('AppRequests | take', 'length')], {
      maxOutputTokens: 1200,
    });

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(transport.calls).toBe(1);
    expect(result.escalated).toBe(false);
    expect(result.metadata.finalMaxTokens).toBe(1200);
  });

  test('empty truncated content escalates and reports an empty completion', async () => {
    const { orchestrator, transport } = setup([completion('', 'length'), completion(null, 'length')]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(transport.calls).toBe(2);
    expect(result.content).toBeNull();
    expect(result.errorCode).toBe('empty-completion');
    expect(result.error).toBe('Empty completion (finish_reason=length)');
  });

  test('content filtering is not retried', async () => {
    const { orchestrator, transport } = setup([completion('', 'content_filter'), completion('unused')]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'));

    expect(transport.calls).toBe(1);
    expect(result.errorCode).toBe('content-filtered');
  });

  test('stops retrying when the next delay would pass the deadline', async () => {
    const { orchestrator, transport, now } = setup([failure(httpError(429)), failure(httpError(429))]);
    const deadline = new Deadline(1500, now);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'), { deadline });

    expect(result.attempts).toBe(2);
    expect(result.errorCode).toBe('deadline-exceeded');
    expect(result.error).toBe('Translation deadline exceeded (last error: Rate limited (HTTP 429))');
    expect(transport.timeouts).toEqual([1500, 500]);
  });

  test('an expired deadline sends nothing', async () => {
    const { orchestrator, transport, now } = setup([completion('unused')]);

    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'), {
      deadline: new Deadline(0, now),
    });

    expect(transport.calls).toBe(0);
    expect(result.attempts).toBe(0);
    expect(result.error).toBe('Translation deadline exceeded');
  });

  test('constrained models carry no sampling parameters, even when escalated', async () => {
    const { orchestrator, transport } = setup(
      [completion('AppRequests', 'length'), completion('AppRequests | take 5')],
      { modelFamily: 'constrained' }
    );

    const request = orchestrator.createRequest('system', 'user');
    const result = await orchestrator.run(request);

    expect(request.temperature).toBeNull();
    expect(result.metadata.finalTemperature).toBeNull();
    expect(transport.payloads).toEqual([
      { messages: [{ role: 'user', content: 'system\n\nuser' }], max_completion_tokens: 500 },
      { messages: [{ role: 'user', content: 'system\n\nuser' }], max_completion_tokens: 750 },
    ]);
  });

  test('reports usage from the final completion', async () => {
    const { orchestrator } = setup([completion('AppTraces | count')]);
    const result = await orchestrator.run(orchestrator.createRequest('s', 'u'), { purpose: 'probe' });
    expect(result.metadata.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    expect(result.metadata.purpose).toBe('probe');
  });
});
