import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryReportRepository, KeywordCatalog } from '@valuation-qa/engine';
import { ZodError } from 'zod';
import { respond, wrapResponse } from '../src/formatters/response.js';
import {
  answerQuestionHandler,
  classifyIntentHandler,
  createQaToolContext,
  extractAggregateParamsHandler,
  listSectorsHandler,
  registerQaTools,
  resolveKeywordHandler,
} from '../src/tools/qa.js';

const ctx = createQaToolContext(
  KeywordCatalog.fromDefinitions({ game: ['게임'], all_keywords: ['게임'] }),
  new InMemoryReportRepository([
    {
      issueDate: '2024-05-01',
      issuerName: 'X',
      issuerSector: 'IT',
      targetName: 'T1',
      targetSector: '게임',
      similarCompanies: '알파게임',
      wacc: 0.12,
    },
    { issueDate: '2023-01-01', issuerName: 'Y', issuerSector: '금융', targetName: 'T2', wacc: 0.1 },
  ]),
);

describe('QA tool handlers', () => {
  it('resolves a similar-company keyword', () => {
    const result = resolveKeywordHandler(ctx, { question: '게임 업계 유사기업' });
    expect(result.found).toBe(true);
    expect(result.keyword).toBe('게임');
    expect(result.source).toBe('smart_search');
    expect(result.match?.matchType).toBe('exact');
  });

  it('rejects a blank question', () => {
    expect(() => resolveKeywordHandler(ctx, { question: ' ' })).toThrow(ZodError);
  });

  it('classifies an intent', () => {
    expect(classifyIntentHandler(ctx, { question: 'WACC Top 5' }).intent).toEqual({
      type: 'aggregate_report',
      kind: 'wacc-top-n',
      params: { topN: 5 },
    });
  });

  it('extracts aggregate parameters', () => {
    expect(extractAggregateParamsHandler({ question: 'WACC Top 5' })).toEqual({
      question: 'WACC Top 5',
      resolved: true,
      kind: 'wacc-top-n',
      params: { topN: 5 },
    });
    expect(extractAggregateParamsHandler({ question: '회사 소개' })).toEqual({
      question: '회사 소개',
      resolved: false,
    });
  });

  it('answers a question and caps the rows', async () => {
    const result = await answerQuestionHandler(ctx, { question: 'WACC Top 1', max_rows: '1' });
    expect(result.row_count).toBe(2);
    expect(result.rows).toHaveLength(1);
    expect(result.aggregate?.status).toBe('ok');
    expect(result.text.startsWith('## WACC 상위 보고서')).toBe(true);
  });

  it('returns no aggregate for a sector search', async () => {
    const result = await answerQuestionHandler(ctx, { question: 'IT' });
    expect(result.intent).toEqual({ type: 'generic_sector_search', sector: 'IT' });
    expect(result.row_count).toBe(1);
    expect(result.aggregate).toBeNull();
  });

  it('lists sectors', async () => {
    expect(await listSectorsHandler(ctx, {})).toEqual({ sectors: ['IT', '금융'] });
  });

  it('registers every tool on a server', () => {
    const server = new McpServer({ name: 'test', version: '0.0.0' });
    expect(() => registerQaTools(server, ctx)).not.toThrow();
  });
});

describe('response formatting', () => {
  it('serializes values as indented JSON', () => {
    expect(wrapResponse({ a: 1 })).toEqual({ content: [{ type: 'text', text: '{\n  "a": 1\n}' }] });
    expect(wrapResponse('plain')).toEqual({ content: [{ type: 'text', text: 'plain' }] });
  });

  it('turns a thrown error into an error result', async () => {
    const result = await respond(() => extractAggregateParamsHandler({ question: '' }));
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text).error).toBe('ZodError');
  });

  it('wraps non-Error throws', async () => {
    const result = await respond(() => {
      throw 'boom';
    });
    expect(JSON.parse(result.content[0].text)).toEqual({ error: 'Error', message: 'boom' });
  });
});
