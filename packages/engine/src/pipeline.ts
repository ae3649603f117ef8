// Valuation Q&A pipeline: question to answer in four stages
//
// Question → Intent classification → Report retrieval (repository)
//   → Aggregate computation (aggregate intents only) → Rendering

import { randomUUID } from 'node:crypto';

import { runAggregate } from '../analytics/run-aggregate.js';
import type { KeywordCatalog } from '../config/keyword-catalog.js';
import type { ReportRepository } from '../db/report-repository.js';
import { SimilarCompanyKeywordResolver } from '../matching/similar-company-resolver.js';
import { SmartSearchResolver } from '../matching/smart-search.js';
import { IntentClassifier } from '../routing/intent-classifier.js';
import type { AggregateOutcome, AnalysisIntent } from '../types/analysis.js';
import { createEvent } from '../types/events.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import type { ValuationReport } from '../types/reports.js';
import {
  MESSAGES,
  evSalesSummary,
  formatAggregate,
  formatEvSales,
  formatSummary,
  generateStructuredSentences,
  markdownTable,
  summarizeRows,
} from '../utils/answer-formatter.js';
import type { ConversationLog } from '../utils/conversation-log.js';

// ── Pipeline types ──────────────────────────────────────────────────

export interface PipelineConfig {
  classifier: IntentClassifier;
  repository: ReportRepository;
  eventBus?: EventBus;
  log?: ConversationLog;
  /** Rows listed for a generic sector search */
  maxListedRows?: number;
  onStatus?: (stage: string, message: string) => void;
}

export interface AnswerResult {
  requestId: string;
  question: string;
  intent: AnalysisIntent;
  rows: ValuationReport[];
  text: string;
  aggregate?: AggregateOutcome;
  timings: {
    classifyMs: number;
    retrieveMs: number;
    renderMs: number;
    totalMs: number;
  };
}

const SOURCE = 'pipeline';
const DEFAULT_MAX_LISTED_ROWS = 20;

interface Retrieved {
  rows: ValuationReport[];
  aggregate?: AggregateOutcome;
}

// ── Pipeline ────────────────────────────────────────────────────────

export class QuestionAnswerer {
  constructor(private readonly config: PipelineConfig) {}

  /**
   * Answer one question. Data-access failures propagate as DataAccessError;
   * everything else (no match, unresolved, missing columns) becomes text.
   */
  async answer(question: string): Promise<AnswerResult> {
    const requestId = randomUUID();
    const t0 = Date.now();
    this.emit('QuestionReceived', { requestId, question });

    this.status('classify', 'Classifying question...');
    const intent = this.config.classifier.classify(question);
    const t1 = Date.now();
    this.emit('IntentClassified', { requestId, intent });
    this.status('classify', `Intent: ${intent.type}`);

    this.status('retrieve', 'Loading reports...');
    const { rows, aggregate } = await this.retrieve(intent);
    const t2 = Date.now();
    this.emit('ReportsRetrieved', { requestId, rowCount: rows.length });
    if (aggregate) {
      this.emit('AggregateComputed', { requestId, kind: aggregate.kind, status: aggregate.status });
    }

    const text = this.render(intent, rows, aggregate);
    const t3 = Date.now();
    this.emit('AnswerRendered', { requestId, length: text.length });

    this.config.log?.append({ question, answer: text, intent: intent.type, rowCount: rows.length });

    return {
      requestId,
      question,
      intent,
      rows,
      text,
      aggregate,
      timings: { classifyMs: t1 - t0, retrieveMs: t2 - t1, renderMs: t3 - t2, totalMs: t3 - t0 },
    };
  }

  private async retrieve(intent: AnalysisIntent): Promise<Retrieved> {
    const repo = this.config.repository;
    switch (intent.type) {
      case 'similar_company':
        return { rows: intent.keyword ? await repo.searchSimilarCompanies(intent.keyword) : [] };
      case 'financial_ratio':
        return { rows: await repo.searchFinancialRatios(intent.sector, { startDate: intent.startDate }) };
      case 'aggregate_report': {
        const rows = await repo.loadAll();
        return { rows, aggregate: runAggregate(intent.kind, intent.params, rows) };
      }
      case 'unresolved_aggregate':
        return { rows: [] };
      case 'generic_sector_search':
        return { rows: await repo.searchBySector(intent.sector) };
    }
  }

  private render(intent: AnalysisIntent, rows: ValuationReport[], aggregate?: AggregateOutcome): string {
    switch (intent.type) {
      case 'similar_company': {
        if (!intent.keyword) return MESSAGES.noKeyword;
        if (rows.length === 0) return MESSAGES.noSimilarCompanies(intent.keyword);
        const how = intent.match
          ? `${intent.match.matchType}, 신뢰도: ${intent.match.confidence.toFixed(2)}`
          : '기본 검색';
        const sentences = generateStructuredSentences(rows);
        return [
          `검색 키워드: '${intent.keyword}' (${how})`,
          formatSummary(summarizeRows(rows)),
          sentences || MESSAGES.noSentences,
        ].join('\n\n');
      }
      case 'financial_ratio': {
        if (rows.length === 0) return MESSAGES.noRatios(intent.sector);
        const condition = `검색 조건: 섹터='${intent.sector}'` +
          (intent.startDate ? `, 시작일='${intent.startDate}'` : '');
        return [condition, formatSummary(summarizeRows(rows)), formatEvSales(evSalesSummary(rows))].join('\n\n');
      }
      case 'aggregate_report':
        return aggregate ? formatAggregate(aggregate) : MESSAGES.unresolved;
      case 'unresolved_aggregate':
        return MESSAGES.unresolved;
      case 'generic_sector_search': {
        if (rows.length === 0) return MESSAGES.noResults;
        const limit = this.config.maxListedRows ?? DEFAULT_MAX_LISTED_ROWS;
        const listed = rows.slice(0, limit);
        const table = markdownTable(
          ['발행일', '발행기업', '평가대상', '대상 사업', '평가기관'],
          listed.map(r => [
            r.issueDate ?? '-', r.issuerName ?? '-', r.targetName ?? '-', r.targetBusiness ?? '-', r.valuator ?? '-',
          ]),
        );
        const more = rows.length > limit ? `\n\n외 ${rows.length - limit}건` : '';
        return `${formatSummary(summarizeRows(rows))}\n\n${table}${more}`;
      }
    }
  }

  // ── Status / events ─────────────────────────────────────────────

  private status(stage: string, message: string): void {
    this.config.onStatus?.(stage, message);
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.config.eventBus?.emit(createEvent(type, SOURCE, payload));
  }
}

/** Wire catalog → smart search → resolver → classifier → pipeline */
export function createQuestionAnswerer(
  catalog: KeywordCatalog,
  repository: ReportRepository,
  options: Omit<PipelineConfig, 'classifier' | 'repository'> = {},
): QuestionAnswerer {
  const resolver = new SimilarCompanyKeywordResolver(new SmartSearchResolver(catalog));
  return new QuestionAnswerer({ ...options, classifier: new IntentClassifier(resolver), repository });
}
