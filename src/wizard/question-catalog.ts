/**
 * Question catalog
 *
 * Ordered, read-only list of wizard steps. Built once at startup; every
 * structural problem is reported here so the engine never has to handle a
 * bad step at runtime.
 */

import { CatalogConfigurationError, StepIndexError } from '../errors.js';
import type { QuestionDefinition, QuestionSpec, ValidationRule } from './types.js';
import { normalizeChoice } from './validator.js';

export class QuestionCatalog {
  private readonly specs: readonly QuestionSpec[];

  constructor(definitions: readonly QuestionDefinition[]) {
    if (definitions.length === 0) {
      throw new CatalogConfigurationError('catalog has no steps');
    }

    const keys = new Set<string>();
    this.specs = Object.freeze(
      definitions.map((definition, position) => {
        if (!Number.isInteger(definition.index) || definition.index !== position) {
          throw new CatalogConfigurationError(
            `step at position ${position} has index ${definition.index}; indices must run 0..${definitions.length - 1} in order`,
            { position, index: definition.index }
          );
        }
        for (const field of ['key', 'label', 'prompt', 'rejection'] as const) {
          if (!definition[field].trim()) {
            throw new CatalogConfigurationError(`step ${position} has an empty ${field}`, {
              position,
              field,
            });
          }
        }
        if (keys.has(definition.key)) {
          throw new CatalogConfigurationError(`duplicate step key '${definition.key}'`, {
            position,
            key: definition.key,
          });
        }
        keys.add(definition.key);

        return Object.freeze({
          ...definition,
          validation: freezeRule(definition.validation, position),
        });
      })
    );
  }

  stepCount(): number {
    return this.specs.length;
  }

  /**
   * @throws StepIndexError when `index` is outside [0, stepCount())
   */
  stepAt(index: number): QuestionSpec {
    const spec = Number.isInteger(index) ? this.specs[index] : undefined;
    if (!spec) {
      throw new StepIndexError(index, this.specs.length);
    }
    return spec;
  }

  steps(): readonly QuestionSpec[] {
    return this.specs;
  }
}

function freezeRule(rule: ValidationRule, position: number): ValidationRule {
  switch (rule.kind) {
    case 'number_positive':
      return Object.freeze({ kind: rule.kind });
    case 'choice_of': {
      if (rule.choices.length === 0) {
        throw new CatalogConfigurationError(`step ${position} offers no choices`, { position });
      }
      const seen = new Set<string>();
      for (const choice of rule.choices) {
        const normalized = normalizeChoice(choice);
        if (!normalized) {
          throw new CatalogConfigurationError(`step ${position} has a blank choice`, { position });
        }
        if (seen.has(normalized)) {
          throw new CatalogConfigurationError(
            `step ${position} lists choice '${normalized}' more than once`,
            { position, choice: normalized }
          );
        }
        seen.add(normalized);
      }
      return Object.freeze({ kind: rule.kind, choices: Object.freeze([...rule.choices]) });
    }
    default: {
      const unknownRule: never = rule;
      throw new CatalogConfigurationError(`step ${position} has an unknown validation kind`, {
        position,
        rule: unknownRule,
      });
    }
  }
}

// ============================================================================
// Parsing untyped definitions (config files)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireText(entry: Record<string, unknown>, field: string, position: number): string {
  const value = entry[field];
  if (typeof value !== 'string') {
    throw new CatalogConfigurationError(`step ${position} is missing '${field}'`, {
      position,
      field,
    });
  }
  return value;
}

function parseRule(raw: unknown, position: number): ValidationRule {
  if (!isRecord(raw) || typeof raw.kind !== 'string') {
    throw new CatalogConfigurationError(`step ${position} is missing 'validation.kind'`, {
      position,
    });
  }

  if (raw.kind === 'number_positive') {
    return { kind: 'number_positive' };
  }
  if (raw.kind === 'choice_of') {
    const choices = raw.choices;
    if (!Array.isArray(choices) || !choices.every((c): c is string => typeof c === 'string')) {
      throw new CatalogConfigurationError(`step ${position} needs a list of string choices`, {
        position,
      });
    }
    return { kind: 'choice_of', choices };
  }

  throw new CatalogConfigurationError(`step ${position} has unknown validation kind '${raw.kind}'`, {
    position,
    kind: raw.kind,
  });
}

/**
 * Turn a question list read from a config file into definitions.
 * Entries take their index from their position unless they give one.
 */
export function parseQuestionDefinitions(raw: unknown): QuestionDefinition[] {
  if (!Array.isArray(raw)) {
    throw new CatalogConfigurationError('questions must be a list');
  }

  return raw.map((entry: unknown, position) => {
    if (!isRecord(entry)) {
      throw new CatalogConfigurationError(`step ${position} is not a mapping`, { position });
    }
    const index = entry.index === undefined ? position : entry.index;
    if (typeof index !== 'number') {
      throw new CatalogConfigurationError(`step ${position} has a non-numeric index`, {
        position,
      });
    }
    return {
      index,
      key: requireText(entry, 'key', position),
      label: requireText(entry, 'label', position),
      prompt: requireText(entry, 'prompt', position),
      rejection: requireText(entry, 'rejection', position),
      validation: parseRule(entry.validation, position),
    };
  });
}
