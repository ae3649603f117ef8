import { z } from "zod";

export const QuestionSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1)
    .describe("Free-text question about valuation disclosure reports, e.g. '게임 업계 유사기업' or 'WACC Top 5'"),
});

export const AnswerQuestionSchema = QuestionSchema.extend({
  max_rows: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe("Rows to return alongside the rendered answer (default 20)"),
});

export const ListSectorsSchema = z.object({});

