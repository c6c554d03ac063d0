/**
 * warden providers — Suitability of every provider of a type
 */

import { Command } from 'commander';
import { buildSuitabilityReport } from '@warden/provider-loader';
import { renderSuitability } from '../output/providers.js';
import type { RuntimeFactory } from '../runtime.js';
import { runtimeFor } from './shared.js';

export function providersCommand(factory: RuntimeFactory): Command {
  const command = new Command('providers')
    .description('List the providers of a resource type, whether each is suitable here, and why not')
    .argument('<type>', 'Resource type, e.g. package')
    .option('--json', 'Output as JSON');

  return command.action((typeName: string, options: { json?: boolean }) => {
    const { registry } = runtimeFor(command, factory);
    if (registry.getType(typeName) === undefined) {
      return command.error(`Unknown resource type ${typeName}. Known types: ${registry.listTypes().join(', ')}`);
    }

    const report = buildSuitabilityReport(registry, typeName);
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(renderSuitability(report));
  });
}
