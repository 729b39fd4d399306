/**
 * Built-in question set for the reduction plan
 */

import type { QuestionDefinition } from './types.js';

export const DEFAULT_QUESTIONS: readonly QuestionDefinition[] = [
  {
    index: 0,
    key: 'puffs',
    label: 'Puffs per day',
    prompt: '📊 How many puffs per day?',
    rejection: '⚠️ Please send a number greater than zero, e.g. 20.',
    validation: { kind: 'number_positive' },
  },
  {
    index: 1,
    key: 'method',
    label: 'Reduction method',
    prompt: "🎯 Reduce by 'number' or 'percent'?",
    rejection: "⚠️ Please answer 'number' or 'percent'.",
    validation: { kind: 'choice_of', choices: ['number', 'percent'] },
  },
  {
    index: 2,
    key: 'goal',
    label: 'Weekly goal',
    prompt: '💪 Weekly reduction goal?',
    rejection: '⚠️ Please send a number greater than zero, e.g. 10.',
    validation: { kind: 'number_positive' },
  },
];
