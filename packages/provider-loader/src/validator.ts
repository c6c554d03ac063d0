/**
 * Warden Provider Loader — Declaration Validator
 *
 * Validates a provider declaration against its resource type before
 * anything is built. Every problem is reported, not just the first.
 *
 * Rules:
 * - the provider name is a non-empty string
 * - every declared capability is a feature of the type
 * - every featureConfines key is a feature of the type
 * - no provider-level criteria mapping is empty
 */

import type { ValidationError, ValidationResult } from '@warden/confine';
import type { ResourceType } from '@warden/kernel';
import type { ProviderDeclaration } from './declaration.js';

export class ProviderValidator {
  /**
   * @returns ok when the declaration can be registered on the type
   */
  validateDeclaration<F extends string>(
    type: ResourceType<F>,
    declaration: ProviderDeclaration<F>,
  ): ValidationResult<void> {
    const errors: ValidationError[] = [];
    const context = `type: ${type.name}, provider: ${declaration.name}`;

    if (typeof declaration.name !== 'string' || declaration.name.trim() === '') {
      errors.push({ message: 'Provider name must be a non-empty string', context });
    }

    for (const name of declaration.capabilities ?? []) {
      if (!type.features.has(name)) {
        errors.push({ message: `Declared capability "${name}" is not a feature of ${type.name}`, context });
      }
    }

    for (const name of Object.keys(declaration.featureConfines ?? {})) {
      if (!type.features.has(name)) {
        errors.push({ message: `Feature confines for "${name}", which is not a feature of ${type.name}`, context });
      }
    }

    (declaration.confines ?? []).forEach((criteria, index) => {
      if (Object.keys(criteria).length === 0) {
        errors.push({ message: `Provider confine #${index + 1} is empty`, context });
      }
    });

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true };
  }
}
