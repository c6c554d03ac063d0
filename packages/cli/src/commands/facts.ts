/**
 * warden facts — Show the host facts confines are evaluated against
 *
 * System facts overlaid by the operator's state/facts.json.
 */

import { Command } from 'commander';
import { renderFacts } from '../output/facts.js';
import type { RuntimeFactory } from '../runtime.js';
import { runtimeFor } from './shared.js';

export function factsCommand(factory: RuntimeFactory): Command {
  const command = new Command('facts')
    .description('Show the resolved host facts')
    .option('--json', 'Output as JSON');

  return command.action((options: { json?: boolean }) => {
    const facts = runtimeFor(command, factory).environment.facts();
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(Object.fromEntries(facts), null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(renderFacts(facts));
  });
}
