import { describe, it, expect } from 'vitest';
import { KeywordCatalog } from '../config/keyword-catalog.js';
import { ExactKeywordMatcher, hasPriorityKeyword, scoreKeyword } from '../matching/exact-matcher.js';

const catalog = KeywordCatalog.fromDefinitions({
  it_software: ['AI', '솔루션', '클라우드', '소프트웨어'],
  consumer: ['서비스'],
});

describe('ExactKeywordMatcher', () => {
  const matcher = new ExactKeywordMatcher(catalog);

  it('ranks a priority term far above a generic one', () => {
    const matches = matcher.findExactMatches('AI 솔루션 기업의 유사기업');

    expect(matches.map(m => [m.keyword, m.priorityScore])).toEqual([
      ['AI', 3920],
      ['솔루션', -470],
    ]);
    expect(matches.every(m => m.matchType === 'exact' && m.confidence === 1)).toBe(true);
    expect(matches[0].category).toBe('it_software');
  });

  it('adds the compact bonus for four or more letters', () => {
    const matches = matcher.findExactMatches('클라우드 소프트웨어 유사기업');
    expect(matches.map(m => [m.keyword, m.priorityScore])).toEqual([
      ['클라우드', 4440],
      ['소프트웨어', 1650],
    ]);
  });

  it('matches case-insensitively', () => {
    const matches = matcher.findExactMatches('ai 기반 서비스');
    expect(matches.map(m => m.keyword)).toEqual(['AI', '서비스']);
  });

  it('yields one candidate per category for a shared keyword', () => {
    const shared = new ExactKeywordMatcher(
      KeywordCatalog.fromDefinitions({ it_software: ['AI'], game: ['AI'] }),
    );
    const matches = shared.findExactMatches('AI 게임');
    expect(matches.map(m => m.category)).toEqual(['it_software', 'game']);
    expect(matches[0].priorityScore).toBe(matches[1].priorityScore);
  });

  it('ignores the all_keywords bucket', () => {
    const flatOnly = new ExactKeywordMatcher(KeywordCatalog.fromDefinitions({ all_keywords: ['AI'] }));
    expect(flatOnly.findExactMatches('AI 유사기업')).toEqual([]);
  });

  it('returns nothing for an empty catalog', () => {
    expect(new ExactKeywordMatcher(KeywordCatalog.empty()).findExactMatches('AI')).toEqual([]);
  });
});

describe('scoreKeyword', () => {
  it('scores English priority and generic terms', () => {
    expect(scoreKeyword('blockchain', 'it_software', true)).toBe(4500);
    expect(scoreKeyword('solution', 'it_software', true)).toBe(80);
  });

  it('drops the priority-query boosts when the query names no priority term', () => {
    expect(scoreKeyword('AI', 'it_software', false)).toBe(1920);
    expect(scoreKeyword('솔루션', 'it_software', false)).toBe(530);
  });

  it('gives no category bonus outside the weighted categories', () => {
    expect(scoreKeyword('서비스', 'consumer', false)).toBe(430);
  });

  it('detects priority terms by substring', () => {
    expect(hasPriorityKeyword('반도체 장비')).toBe(true);
    expect(hasPriorityKeyword('게임 유사기업')).toBe(false);
  });
});
