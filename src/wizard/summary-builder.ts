/**
 * Final confirmation message
 */

import type { QuestionCatalog } from './question-catalog.js';
import type { AnswerValue } from './types.js';

export const SUMMARY_HEADER = '✅ Setup complete:';

// Plain positional notation: 1e21 prints as 1000000000000000000000, 1e-7 as 0.0000001
const NUMBER_FORMAT = new Intl.NumberFormat('en-US', {
  useGrouping: false,
  maximumFractionDigits: 20,
});

function formatValue(value: AnswerValue): string {
  return typeof value === 'number' ? NUMBER_FORMAT.format(value) : value;
}

/**
 * Render one bullet per step, in step order.
 * `answers` must hold exactly one value per catalog step.
 */
export function buildSummary(catalog: QuestionCatalog, answers: readonly AnswerValue[]): string {
  if (answers.length !== catalog.stepCount()) {
    throw new Error(
      `Summary needs ${catalog.stepCount()} answers, got ${answers.length}`
    );
  }

  const lines = catalog
    .steps()
    .map((spec, index) => `• ${spec.label}: ${formatValue(answers[index])}`);

  return [SUMMARY_HEADER, ...lines].join('\n');
}
