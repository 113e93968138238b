import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ChatResult } from '../../core/types.js';
import { ChatEventLogger, buildChatEvent, hashContent } from '../chat-events.js';

function result(content: string | null): ChatResult {
  return {
    content,
    finishReason: content === null ? null : 'stop',
    error: content === null ? 'Rate limited (HTTP 429) after 3 attempts' : null,
    errorCode: content === null ? 'rate-limit' : null,
    attempts: 2,
    escalated: false,
    metadata: {
      purpose: 'translate',
      deployment: 'test-deployment',
      modelFamily: 'standard',
      initialMaxTokens: 500,
      finalMaxTokens: 500,
      initialTemperature: 0.2,
      finalTemperature: 0.2,
      errorCode: content === null ? 'rate-limit' : null,
      escalationAttempts: 0,
      durationMs: 42,
    },
  };
}

const timestamp = new Date('2024-05-01T12:00:00.000Z');

describe('buildChatEvent', () => {
  test('records a hash and preview instead of the content', () => {
    const content = 'AppRequests | where Success == false | summarize count() by bin(TimeGenerated, 1h)';
    const event = buildChatEvent(result(content), { domain: 'appinsights', pipelineAttempt: 1 }, {
      previewChars: 11,
      timestamp,
    });

    expect(event).toEqual({
      timestamp: '2024-05-01T12:00:00.000Z',
      purpose: 'translate',
      deployment: 'test-deployment',
      modelFamily: 'standard',
      domain: 'appinsights',
      pipelineAttempt: 1,
      attempts: 2,
      escalated: false,
      finishReason: 'stop',
      errorCode: null,
      error: null,
      maxTokens: { initial: 500, final: 500 },
      temperature: { initial: 0.2, final: 0.2 },
      durationMs: 42,
      contentHash: hashContent(content),
      contentPreview: 'AppRequests',
    });
    expect(event.contentHash).toMatch(/^[0-9a-f]{16}$/);
  });

  test('includes full content only when asked', () => {
    const event = buildChatEvent(result('AppTraces'), {}, { includeFullContent: true, timestamp });
    expect(event.content).toBe('AppTraces');
  });

  test('failures carry no content fields', () => {
    const event = buildChatEvent(result(null), {}, { includeFullContent: true, timestamp });
    expect(event.contentHash).toBeNull();
    expect(event.contentPreview).toBeNull();
    expect(event.content).toBeUndefined();
    expect(event.errorCode).toBe('rate-limit');
  });
});

describe('ChatEventLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kql-events-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('appends one JSON line per event', async () => {
    const filePath = path.join(dir, 'nested', 'events.jsonl');
    const logger = new ChatEventLogger({ enabled: true, filePath, now: () => timestamp });

    void logger.record(result('AppTraces'), { domain: 'appinsights' });
    void logger.record(result(null), { domain: 'appinsights', pipelineAttempt: 2 });
    await logger.flush();

    const lines = fs.readFileSync(filePath, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ contentPreview: 'AppTraces', domain: 'appinsights' });
    expect(JSON.parse(lines[1])).toMatchObject({ errorCode: 'rate-limit', pipelineAttempt: 2 });
  });

  test('writes nothing when disabled', async () => {
    const filePath = path.join(dir, 'events.jsonl');
    const logger = new ChatEventLogger({ enabled: false, filePath });

    await logger.record(result('AppTraces'));

    expect(logger.enabled).toBe(false);
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
