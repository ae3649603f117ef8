import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  IntentClassifier,
  QuestionAnswerer,
  createKeywordResolver,
  extractAggregateParams,
} from "@valuation-qa/engine";
import type {
  KeywordCatalog,
  ReportRepository,
  SimilarCompanyKeywordResolver,
} from "@valuation-qa/engine";
import { AnswerQuestionSchema, ListSectorsSchema, QuestionSchema } from "../schemas/qa.js";
import { respond } from "../formatters/response.js";

const DEFAULT_MAX_ROWS = 20;

export interface QaToolContext {
  resolver: SimilarCompanyKeywordResolver;
  classifier: IntentClassifier;
  answerer: QuestionAnswerer;
  repository: ReportRepository;
}

export function createQaToolContext(catalog: KeywordCatalog, repository: ReportRepository): QaToolContext {
  const resolver = createKeywordResolver(catalog);
  const classifier = new IntentClassifier(resolver);
  return { resolver, classifier, repository, answerer: new QuestionAnswerer({ classifier, repository }) };
}

// ── Handlers (exported for tests) ───────────────────────────────────

export function resolveKeywordHandler(ctx: QaToolContext, params: unknown) {
  const { question } = QuestionSchema.parse(params);
  const resolution = ctx.resolver.resolve(question);
  return {
    question,
    found: resolution !== null,
    keyword: resolution?.keyword ?? null,
    source: resolution?.source ?? null,
    match: resolution?.match ?? null,
  };
}

export function classifyIntentHandler(ctx: QaToolContext, params: unknown) {
  const { question } = QuestionSchema.parse(params);
  return { question, intent: ctx.classifier.classify(question) };
}

export function extractAggregateParamsHandler(params: unknown) {
  const { question } = QuestionSchema.parse(params);
  const route = extractAggregateParams(question);
  return route
    ? { question, resolved: true, kind: route.kind, params: route.params }
    : { question, resolved: false };
}

export async function answerQuestionHandler(ctx: QaToolContext, params: unknown) {
  const { question, max_rows } = AnswerQuestionSchema.parse(params);
  const result = await ctx.answerer.answer(question);
  return {
    question,
    intent: result.intent,
    text: result.text,
    row_count: result.rows.length,
    rows: result.rows.slice(0, max_rows ?? DEFAULT_MAX_ROWS),
    aggregate: result.aggregate ?? null,
  };
}

export async function listSectorsHandler(ctx: QaToolContext, params: unknown) {
  ListSectorsSchema.parse(params);
  return { sectors: await ctx.repository.listSectors() };
}

// ── Registration ────────────────────────────────────────────────────

export function registerQaTools(server: McpServer, ctx: QaToolContext) {
  server.tool(
    "resolve_similar_company_keyword",
    "Resolve the business keyword behind a similar-company (peer group) question. Runs exact keyword matching and fuzzy industry matching over the keyword catalog, then falls back to business-list and '<word> 사업' pattern extraction. Returns the keyword, how it was found, and the best match candidate.",
    QuestionSchema.shape,
    async (params) => respond(() => resolveKeywordHandler(ctx, params))
  );

  server.tool(
    "classify_intent",
    "Classify a question as similar_company, financial_ratio, aggregate_report, unresolved_aggregate or generic_sector_search, with the extracted keyword, sector, start date or aggregate parameters.",
    QuestionSchema.shape,
    async (params) => respond(() => classifyIntentHandler(ctx, params))
  );

  server.tool(
    "extract_aggregate_params",
    "Map an analytical question to one of the aggregate analyses (industry WACC median, valuator comparison, g ≥ WACC violations, WACC top N, yearly statistics, WACC trend and others) with its parameters: year, sector, metric, top N. Returns resolved=false when no analysis applies.",
    QuestionSchema.shape,
    async (params) => respond(() => extractAggregateParamsHandler(params))
  );

  server.tool(
    "answer_question",
    "Answer a question end to end: classify it, query the valuation report store, compute the selected aggregate, and render a Korean text answer with markdown tables. Returns the text, the intent and up to max_rows matching rows.",
    AnswerQuestionSchema.shape,
    async (params) => respond(() => answerQuestionHandler(ctx, params))
  );

  server.tool(
    "list_sectors",
    "List the distinct issuer sectors present in the valuation report store.",
    async () => respond(() => listSectorsHandler(ctx, {}))
  );
}
