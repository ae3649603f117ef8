// Term lists shared by the router, the ratio path and the aggregates
// Bundled with the package in data/vocabulary.json

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const VocabularySchema = z.object({
  sectorKeywords: z.array(z.string().min(1)).min(1),
  fallbackBusinesses: z.array(z.string().min(1)),
  trendYears: z.array(z.number().int()),
  trendSectors: z.array(z.string().min(1)),
  investmentPurposes: z.array(z.string().min(1)),
  defaultRatioSector: z.string().min(1),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const vocabularyPath = join(dirname(fileURLToPath(import.meta.url)), 'data', 'vocabulary.json');

export const VOCABULARY: Vocabulary = VocabularySchema.parse(
  JSON.parse(readFileSync(vocabularyPath, 'utf-8')),
);
