/**
 * warden log — Query the confinement log
 *
 * Reads logs/confinement.jsonl under the warden home. Events are
 * deduplicated and ordered by time; --limit keeps the most recent ones.
 */

import { Command } from 'commander';
import { CONFINEMENT_EVENT_KINDS, isConfinementEventKind } from '@warden/kernel';
import { CONFINEMENT_LOG, readConfinementLog } from '@warden/runtime-host';
import { renderLog } from '../output/log.js';
import type { RuntimeFactory } from '../runtime.js';
import { parsePositiveInt, runtimeFor } from './shared.js';

interface LogOptions {
  type?: string;
  provider?: string;
  event?: string;
  limit: number;
  json?: boolean;
}

export function logCommand(factory: RuntimeFactory): Command {
  const command = new Command('log')
    .description('Query the confinement log')
    .option('--type <type>', 'Filter by resource type')
    .option('--provider <name>', 'Filter by provider')
    .option('--event <kind>', `Filter by event kind (${CONFINEMENT_EVENT_KINDS.join('|')})`)
    .option('--limit <n>', 'Maximum number of entries to return', parsePositiveInt, 100)
    .option('--json', 'Output as JSON');

  return command.action((options: LogOptions) => {
    if (options.event !== undefined && !isConfinementEventKind(options.event)) {
      return command.error(`Unknown event kind: ${options.event}\n  Valid: ${CONFINEMENT_EVENT_KINDS.join(', ')}`);
    }

    const { stateIO } = runtimeFor(command, factory);
    const { events } = readConfinementLog(stateIO.readLogRaw(CONFINEMENT_LOG));
    const matching = events.filter(
      (e) =>
        (options.type === undefined || e.type === options.type) &&
        (options.provider === undefined || e.provider === options.provider) &&
        (options.event === undefined || e.event === options.event),
    );
    const entries = matching.slice(-options.limit);

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(entries, null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(renderLog(entries));
  });
}
