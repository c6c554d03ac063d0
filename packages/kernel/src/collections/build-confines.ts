import {
  ConfineKind,
  FOR_BINARY_KEY,
  createConfine,
  type Confine,
  type ConfineCriteria,
  type HostEnvironment,
} from '@warden/confine';

/**
 * Turn a criteria mapping into labelled confines, in key order.
 *
 * The reserved `for_binary` key is not a confine: it is stripped, and when
 * truthy it sets `forBinary` on the `exists` confines built from the same
 * mapping. The mapping itself is never modified.
 *
 * @throws {DefinitionError} If any entry has an empty value list
 */
export function buildConfines(
  criteria: ConfineCriteria,
  label: string,
  environment: HostEnvironment,
): Confine[] {
  const forBinary = Boolean(criteria[FOR_BINARY_KEY]);
  const confines: Confine[] = [];
  for (const [key, values] of Object.entries(criteria)) {
    if (key === FOR_BINARY_KEY) continue;
    const confine = createConfine(key, values, environment);
    if (forBinary && confine.kind === ConfineKind.Exists) {
      confine.forBinary = true;
    }
    confine.label = label;
    confines.push(confine);
  }
  return confines;
}
