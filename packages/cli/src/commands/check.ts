/**
 * warden check — Does a provider have the given features?
 *
 * Prints the provider's suitability and capabilities. Exits 1 when any
 * listed feature is missing, so scripts can gate on the answer:
 *
 *   warden check package apt holdable purgeable && echo ok
 */

import { Command } from 'commander';
import { renderCheck, type CheckResult } from '../output/check.js';
import type { RuntimeFactory } from '../runtime.js';
import { runtimeFor } from './shared.js';

export function checkCommand(factory: RuntimeFactory): Command {
  const command = new Command('check')
    .description('Check that a provider has every listed feature (exit 1 otherwise)')
    .argument('<type>', 'Resource type, e.g. package')
    .argument('<provider>', 'Provider name, e.g. apt')
    .argument('[features...]', 'Features the provider must have')
    .option('--json', 'Output as JSON');

  return command.action(
    (typeName: string, providerName: string, features: string[], options: { json?: boolean }) => {
      const { registry } = runtimeFor(command, factory);
      const provider = registry.provider(typeName, providerName);
      if (provider === undefined) {
        return command.error(`Unknown provider ${providerName} for ${typeName}`);
      }

      const result: CheckResult = {
        type: typeName,
        provider: providerName,
        suitable: provider.suitable(),
        capabilities: provider.queries.capabilities(),
        missing: features.filter((name) => !provider.queries.hasCapability(name)),
      };

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(result, null, 2));
      } else {
        // eslint-disable-next-line no-console
        console.log(renderCheck(result));
      }

      if (!provider.queries.satisfies(features)) {
        command.error(`Provider ${providerName} of ${typeName} lacks: ${result.missing.join(', ')}`, {
          exitCode: 1,
          code: 'warden.unsatisfied',
        });
      }
    },
  );
}
