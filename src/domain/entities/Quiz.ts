import { z } from 'zod';

export const OPTION_LABELS = ['A', 'B', 'C', 'D'] as const;

export type OptionLabel = (typeof OPTION_LABELS)[number];

// Unknown top-level keys are stripped; the option set must be exactly A-D
export const quizQuestionSchema = z.object({
  question: z.string().refine((value) => value.trim().length > 0, 'question must not be empty'),
  options: z
    .object({
      A: z.string(),
      B: z.string(),
      C: z.string(),
      D: z.string(),
    })
    .strict(),
  correct_answer: z.enum(OPTION_LABELS),
  explanation: z.string(),
});

export type QuizQuestion = z.infer<typeof quizQuestionSchema>;

export const MIN_QUIZ_QUESTIONS = 1;
export const MAX_QUIZ_QUESTIONS = 50;
