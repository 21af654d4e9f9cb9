import {
  MAX_QUIZ_QUESTIONS,
  MIN_QUIZ_QUESTIONS,
  OPTION_LABELS,
  quizQuestionSchema,
  type QuizQuestion,
} from '../entities/Quiz';
import { MIN_CONTENT_LENGTH } from '../entities/CourseDocument';
import { InvalidAIOutputError, InvalidInputError } from '../errors';
import type { CompletionProvider } from './CompletionProvider';
import { log } from '../../utils/logger';

// Characters of source content sent to the model
export const QUIZ_CONTENT_BUDGET = 6000;

const QUIZ_MAX_TOKENS = 4000;
const QUIZ_TEMPERATURE = 0.3;

// Models miss exact counts; accept anything down to 80% of the request
const COUNT_TOLERANCE = 0.2;

const FENCE_PATTERN = /^\s*```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)\n?\s*```\s*$/;

export function minimumAcceptedCount(count: number): number {
  return Math.max(1, Math.ceil(count * (1 - COUNT_TOLERANCE)));
}

export function stripCodeFence(raw: string): string {
  const match = FENCE_PATTERN.exec(raw);
  return match ? match[1].trim() : raw.trim();
}

export function buildQuizPrompt(content: string, count: number, topic?: string): string {
  const focus = topic?.trim() ? `\nFocus the questions on this topic: ${topic.trim()}\n` : '';

  return `You are an expert exam question setter.

Using ONLY the content below, generate exactly ${count} multiple-choice questions.
${focus}
Rules:
- Each question must come directly from the content
- Exactly 4 options labelled "A", "B", "C", "D"
- Exactly ONE correct answer
- No placeholders
- Output a STRICT JSON array only: no prose, no markdown, no code fences

Each array element must have this shape:
{"question": "...", "options": {"A": "...", "B": "...", "C": "...", "D": "..."}, "correct_answer": "A", "explanation": "..."}

CONTENT:
"""
${content.slice(0, QUIZ_CONTENT_BUDGET)}
"""`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parses the completion into a list, repairing code fences and surrounding
 * prose. Returns null when no list can be recovered.
 */
export function parseQuestionList(raw: string): unknown[] | null {
  const unfenced = stripCodeFence(raw);

  let parsed = tryParseJson(unfenced);
  if (!parsed.ok) {
    const start = unfenced.indexOf('[');
    const end = unfenced.lastIndexOf(']');
    if (start === -1 || end <= start) {
      return null;
    }
    parsed = tryParseJson(unfenced.slice(start, end + 1));
    if (!parsed.ok) {
      return null;
    }
  }

  const value = parsed.value;
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value) && Array.isArray(value.questions)) {
    return value.questions;
  }
  return null;
}

// Lower-case option keys and answer letters are accepted and upper-cased
function normalizeQuestion(item: unknown): unknown {
  if (!isRecord(item)) {
    return item;
  }

  const normalized: Record<string, unknown> = { ...item };

  if (isRecord(item.options)) {
    const keys = Object.keys(item.options);
    const lowerLabels = OPTION_LABELS.map((label) => label.toLowerCase());
    const isLowercaseSet = keys.length === lowerLabels.length && lowerLabels.every((label) => keys.includes(label));
    if (isLowercaseSet) {
      const options = item.options;
      normalized.options = Object.fromEntries(OPTION_LABELS.map((label) => [label, options[label.toLowerCase()]]));
    }
  }

  if (typeof item.correct_answer === 'string') {
    normalized.correct_answer = item.correct_answer.trim().toUpperCase();
  }

  return normalized;
}

export function validateQuestions(items: unknown[]): { valid: QuizQuestion[]; rejected: number } {
  const valid: QuizQuestion[] = [];
  let rejected = 0;

  items.forEach((item, index) => {
    const result = quizQuestionSchema.safeParse(normalizeQuestion(item));
    if (result.success) {
      valid.push(result.data);
    } else {
      rejected++;
      log('warn', 'Dropping invalid quiz question', {
        index,
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }
  });

  return { valid, rejected };
}

export class QuizService {
  constructor(private completionProvider: CompletionProvider) {}

  async generateQuiz(content: string, count: number, topic?: string): Promise<QuizQuestion[]> {
    const trimmed = content.trim();
    if (trimmed.length < MIN_CONTENT_LENGTH) {
      throw new InvalidInputError(
        `Quiz content must be at least ${MIN_CONTENT_LENGTH} characters after trimming (got ${trimmed.length})`
      );
    }
    if (!Number.isInteger(count) || count < MIN_QUIZ_QUESTIONS || count > MAX_QUIZ_QUESTIONS) {
      throw new InvalidInputError(
        `Question count must be an integer between ${MIN_QUIZ_QUESTIONS} and ${MAX_QUIZ_QUESTIONS} (got ${count})`
      );
    }

    log('info', 'Generating quiz', { count, topic: topic ?? null, contentLength: trimmed.length });

    const raw = await this.completionProvider.complete(buildQuizPrompt(trimmed, count, topic), {
      maxTokens: QUIZ_MAX_TOKENS,
      temperature: QUIZ_TEMPERATURE,
    });

    const items = parseQuestionList(raw);
    if (!items) {
      throw new InvalidAIOutputError('Quiz output is not a JSON array of questions', raw);
    }

    const floor = minimumAcceptedCount(count);
    if (items.length < floor) {
      throw new InvalidAIOutputError(
        `Quiz output has ${items.length} questions, expected ${count} (minimum ${floor})`,
        raw
      );
    }

    const { valid, rejected } = validateQuestions(items);
    if (valid.length < floor) {
      throw new InvalidAIOutputError(
        `Only ${valid.length} of ${items.length} quiz questions are valid, expected at least ${floor}`,
        raw
      );
    }

    log('info', 'Quiz generated', { requested: count, received: items.length, valid: valid.length, rejected });
    return valid.slice(0, count);
  }
}
