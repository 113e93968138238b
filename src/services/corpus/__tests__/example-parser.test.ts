import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CorpusError } from '../../../core/errors.js';
import { parseExampleFile, parseExamples } from '../example-parser.js';

const MARKDOWN = [
  '# Request examples',
  '**How many requests failed?**',
  '```kql',
  'AppRequests | where Success == false | count',
  '```',
  '**Orphan question without a query**',
  '**Requests per role**',
  'Some prose between the question and the query.',
  '```KQL',
  'AppRequests',
  '| summarize count() by AppRoleName',
  '```',
  '**Unclosed block**',
  '```kql',
  'AppRequests | take 1',
].join('\n');

const LEGACY = [
  'Q: Show recent traces',
  'KQL:',
  'AppTraces',
  '| take 5',
  '',
  'Q: Count traces',
  'KQL: AppTraces | count',
  'q: Question without a query',
  'KQL:',
  'Q: Traces by severity',
  'kql:',
  'AppTraces | summarize count() by SeverityLevel',
].join('\n');

describe('parseExamples', () => {
  test('reads markdown examples and skips malformed blocks', () => {
    expect(parseExamples(MARKDOWN)).toEqual([
      { question: 'How many requests failed?', query: 'AppRequests | where Success == false | count' },
      { question: 'Requests per role', query: 'AppRequests\n| summarize count() by AppRoleName' },
    ]);
  });

  test('reads the line-oriented layout', () => {
    expect(parseExamples(LEGACY)).toEqual([
      { question: 'Show recent traces', query: 'AppTraces\n| take 5' },
      { question: 'Count traces', query: 'AppTraces | count' },
      { question: 'Traces by severity', query: 'AppTraces | summarize count() by SeverityLevel' },
    ]);
  });

  test('prefers markdown when a file mixes both layouts', () => {
    const mixed = `${LEGACY}\n\n**Markdown question**\n\`\`\`kql\nAppRequests | take 1\n\`\`\`\n`;
    expect(parseExamples(mixed)).toEqual([{ question: 'Markdown question', query: 'AppRequests | take 1' }]);
  });

  test('accepts CRLF line endings', () => {
    expect(parseExamples('**Q**\r\n```kql\r\nAppRequests\r\n```\r\n')).toEqual([
      { question: 'Q', query: 'AppRequests' },
    ]);
  });

  test('parses rendered examples back to the same pairs', () => {
    const pairs = [
      { question: 'Slowest operations', query: 'AppRequests\n| top 5 by DurationMs desc' },
      { question: 'Exceptions by type', query: 'AppExceptions | summarize count() by ExceptionType' },
    ];
    const rendered = pairs.map((p) => `**${p.question}**\n\`\`\`kql\n${p.query}\n\`\`\``).join('\n\n');
    expect(parseExamples(rendered)).toEqual(pairs);
  });

  test('returns nothing for text without examples', () => {
    expect(parseExamples('just some notes\nwith no examples')).toEqual([]);
  });
});

describe('parseExampleFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kql-examples-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('a missing file yields no examples', async () => {
    await expect(parseExampleFile(path.join(dir, 'absent.md'))).resolves.toEqual([]);
  });

  test('an unreadable path raises CorpusError', async () => {
    await expect(parseExampleFile(dir)).rejects.toBeInstanceOf(CorpusError);
  });

  test('reads a file from disk', async () => {
    const file = path.join(dir, 'examples.md');
    fs.writeFileSync(file, '**Q**\n```kql\nAppTraces\n```\n');
    await expect(parseExampleFile(file)).resolves.toEqual([{ question: 'Q', query: 'AppTraces' }]);
  });
});
