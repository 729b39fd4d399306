/**
 * Answer validation
 *
 * Pure checks of a raw reply against the rule of its step. A refused answer
 * is reported with the step's own message and never echoes the input.
 */

import type { QuestionSpec, ValidationOutcome } from './types.js';

/** Plain decimal: digits with an optional fraction, optional leading '+' */
const DECIMAL_PATTERN = /^\+?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Case-fold and trim a choice for comparison
 */
export function normalizeChoice(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Parse a decimal number, or null when the text is not one.
 * Values beyond double range come back as null (overflow) or 0 (underflow),
 * so `number_positive` refuses both.
 */
export function parseDecimal(raw: string): number | null {
  const text = raw.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function validateAnswer(spec: QuestionSpec, raw: string): ValidationOutcome {
  const rule = spec.validation;

  switch (rule.kind) {
    case 'number_positive': {
      const value = parseDecimal(raw);
      if (value === null || value <= 0) {
        return { status: 'rejected', reason: spec.rejection };
      }
      return { status: 'accepted', value };
    }
    case 'choice_of': {
      const answer = normalizeChoice(raw);
      const match = rule.choices.find((choice) => normalizeChoice(choice) === answer);
      if (match === undefined) {
        return { status: 'rejected', reason: spec.rejection };
      }
      return { status: 'accepted', value: normalizeChoice(match) };
    }
  }
}
