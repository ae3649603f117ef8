// Keyword catalog: business keywords by category and similar-industry mappings
// Loaded once per process from two JSON resources; read-only afterwards.
// A missing or malformed resource degrades to an empty catalog, never a throw.

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ALL_KEYWORDS_BUCKET } from '../types/catalog.js';
import type {
  IndustryDefinitions,
  KeywordDefinitions,
  KeywordEntry,
  SimilarIndustryEntry,
} from '../types/catalog.js';
import { createEvent } from '../types/events.js';
import type { EventBus } from '../types/events.js';

const __catalogDir = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_KEYWORDS_PATH = join(__catalogDir, 'data', 'business_keywords.json');
export const DEFAULT_INDUSTRIES_PATH = join(__catalogDir, 'data', 'similar_industries.json');

const DefinitionsSchema = z.record(z.string(), z.array(z.string()));

export interface CatalogLoadOptions {
  keywordsPath?: string;
  industriesPath?: string;
  eventBus?: EventBus;
}

export class KeywordCatalog {
  private readonly categoryMap: ReadonlyMap<string, readonly string[]>;
  private readonly allKeywordList: readonly string[];
  private readonly industryMap: ReadonlyMap<string, readonly string[]>;

  private constructor(
    keywords: KeywordDefinitions,
    industries: IndustryDefinitions,
    /** Non-fatal problems met while loading */
    readonly warnings: readonly string[] = [],
  ) {
    const categories = new Map<string, readonly string[]>();
    for (const [category, list] of Object.entries(keywords)) {
      if (category === ALL_KEYWORDS_BUCKET) continue;
      categories.set(category, Object.freeze(list.filter(k => k.length > 0)));
    }
    this.categoryMap = categories;
    this.allKeywordList = Object.freeze((keywords[ALL_KEYWORDS_BUCKET] ?? []).filter(k => k.length > 0));
    this.industryMap = new Map(
      Object.entries(industries).map(([industry, related]) => [industry, Object.freeze([...related])]),
    );
  }

  /**
   * Load the catalog from its JSON resources.
   * Paths default to VQA_KEYWORDS_PATH / VQA_INDUSTRIES_PATH, then to the bundled data.
   */
  static load(options: CatalogLoadOptions = {}): KeywordCatalog {
    const keywordsPath = options.keywordsPath ?? process.env.VQA_KEYWORDS_PATH ?? DEFAULT_KEYWORDS_PATH;
    const industriesPath = options.industriesPath ?? process.env.VQA_INDUSTRIES_PATH ?? DEFAULT_INDUSTRIES_PATH;

    const keywords = readDefinitions(keywordsPath);
    const industries = readDefinitions(industriesPath);

    if (!keywords.ok || !industries.ok) {
      const warnings = [keywords, industries].flatMap(r => (r.ok ? [] : [r.warning]));
      for (const warning of warnings) {
        console.warn(`[keyword-catalog] ${warning}; falling back to an empty catalog`);
      }
      options.eventBus?.emit(createEvent('CatalogDegraded', 'keyword-catalog', { warnings }));
      return new KeywordCatalog({}, {}, warnings);
    }

    const catalog = new KeywordCatalog(keywords.value, industries.value);
    options.eventBus?.emit(createEvent('CatalogLoaded', 'keyword-catalog', {
      categories: catalog.categoryMap.size,
      keywords: catalog.allKeywordList.length,
      industries: catalog.industryMap.size,
    }));
    return catalog;
  }

  static fromDefinitions(keywords: KeywordDefinitions, industries: IndustryDefinitions = {}): KeywordCatalog {
    return new KeywordCatalog(keywords, industries);
  }

  static empty(): KeywordCatalog {
    return new KeywordCatalog({}, {});
  }

  /** category → keywords, excluding the `all_keywords` bucket */
  categories(): ReadonlyMap<string, readonly string[]> {
    return this.categoryMap;
  }

  /** Flattened keyword list for fuzzy matching; may contain duplicates */
  allKeywords(): readonly string[] {
    return this.allKeywordList;
  }

  similarIndustries(): ReadonlyMap<string, readonly string[]> {
    return this.industryMap;
  }

  *entries(): IterableIterator<KeywordEntry> {
    for (const [category, keywords] of this.categoryMap) {
      for (const keyword of keywords) {
        yield { keyword, category };
      }
    }
  }

  *industryEntries(): IterableIterator<SimilarIndustryEntry> {
    for (const [industry, relatedKeywords] of this.industryMap) {
      yield { industry, relatedKeywords };
    }
  }

  get isEmpty(): boolean {
    return this.categoryMap.size === 0 && this.allKeywordList.length === 0 && this.industryMap.size === 0;
  }
}

type ReadResult =
  | { ok: true; value: Record<string, string[]> }
  | { ok: false; warning: string };

function readDefinitions(path: string): ReadResult {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, warning: `keyword resource not readable: ${path} (${msg})` };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, warning: `keyword resource is not valid JSON: ${path} (${msg})` };
  }

  const parsed = DefinitionsSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, warning: `keyword resource has an unexpected shape: ${path}` };
  }
  return { ok: true, value: parsed.data };
}
