/**
 * Warden Runtime Host — Operator State
 *
 * Validation of the operator-maintained state files:
 *
 *   state/facts.json     { "<fact>": string | number | boolean }
 *   state/features.json  ["<feature>", ...]
 *
 * An absent file is an empty configuration. A present file that is not
 * valid JSON, or has the wrong shape, is rejected as a whole with every
 * problem listed.
 */

import type { FactValue, ValidationError, ValidationResult } from '@warden/confine';
import type { StateIO } from '../state/state-io.js';

export const FACTS_FILE = 'facts.json';
export const FEATURES_FILE = 'features.json';

/** Thrown when an operator state file is present but malformed. */
export class HostConfigurationError extends Error {
  constructor(
    readonly filename: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(
      `Invalid ${filename}:\n` +
        errors.map((e) => `  ${e.context !== undefined ? `${e.context}: ` : ''}${e.message}`).join('\n'),
    );
    this.name = 'HostConfigurationError';
  }
}

export function validateFacts(raw: unknown): ValidationResult<Readonly<Record<string, FactValue>>> {
  if (raw === undefined) return { ok: true, value: {} };
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [{ message: 'must be a JSON object of fact names to values' }] };
  }

  const facts: Record<string, FactValue> = {};
  const errors: ValidationError[] = [];
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      facts[name.toLowerCase()] = value;
    } else {
      errors.push({ message: 'must be a string, number or boolean', context: name });
    }
  }
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: facts };
}

export function validateFeatures(raw: unknown): ValidationResult<ReadonlyArray<string>> {
  if (raw === undefined) return { ok: true, value: [] };
  if (!Array.isArray(raw)) {
    return { ok: false, errors: [{ message: 'must be a JSON array of feature names' }] };
  }

  const errors: ValidationError[] = [];
  const features: string[] = [];
  raw.forEach((item: unknown, index) => {
    if (typeof item === 'string' && item.trim() !== '') {
      features.push(item.trim());
    } else {
      errors.push({ message: 'must be a non-empty string', context: `[${index}]` });
    }
  });
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: features };
}

/**
 * Load both operator files.
 *
 * @throws {HostConfigurationError} If either file is malformed
 */
export function loadOperatorState(stateIO: StateIO): {
  facts: Readonly<Record<string, FactValue>>;
  features: ReadonlyArray<string>;
} {
  const facts = validateFacts(readStateFile(stateIO, FACTS_FILE));
  if (!facts.ok) throw new HostConfigurationError(FACTS_FILE, facts.errors);
  const features = validateFeatures(readStateFile(stateIO, FEATURES_FILE));
  if (!features.ok) throw new HostConfigurationError(FEATURES_FILE, features.errors);
  return { facts: facts.value, features: features.value };
}

/** Parsed content of a state file, or undefined when it is absent. */
function readStateFile(stateIO: StateIO, filename: string): unknown {
  const text = stateIO.readText(filename);
  if (text === undefined) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new HostConfigurationError(filename, [{ message: `is not valid JSON: ${err.message}` }]);
    }
    throw err;
  }
}
