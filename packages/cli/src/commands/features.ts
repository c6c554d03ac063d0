/**
 * warden features — Document the features of a resource type
 *
 * Prints one line per feature and a matrix of which providers have which
 * feature on this host.
 */

import { Command } from 'commander';
import type { RuntimeFactory } from '../runtime.js';
import { runtimeFor } from './shared.js';

export function featuresCommand(factory: RuntimeFactory): Command {
  const command = new Command('features')
    .description('Show the features of a resource type and which providers have them')
    .argument('<type>', 'Resource type, e.g. package');

  return command.action((typeName: string) => {
    const { registry } = runtimeFor(command, factory);
    const type = registry.getType(typeName);
    if (type === undefined) {
      return command.error(`Unknown resource type ${typeName}. Known types: ${registry.listTypes().join(', ')}`);
    }

    // eslint-disable-next-line no-console
    console.log(type.documentation(registry.providerSource(typeName)) ?? `${typeName} declares no features`);
  });
}
