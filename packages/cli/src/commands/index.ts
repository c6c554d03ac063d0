/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by src/bin/warden.ts and by tests, which pass their own
 * RuntimeFactory.
 */

import { Command } from 'commander';
import { buildRuntime, type RuntimeFactory } from '../runtime.js';
import { checkCommand } from './check.js';
import { factsCommand } from './facts.js';
import { featuresCommand } from './features.js';
import { logCommand } from './log.js';
import { providersCommand } from './providers.js';

export function createProgram(factory: RuntimeFactory = buildRuntime): Command {
  return new Command('warden')
    .description(
      'Warden: which providers of a resource type can run on this host, and which features each has.\n' +
        'Providers are confined by host facts, files, binaries and global features.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Warden home directory (default: WARDEN_HOME, the OS config file, ~/.warden)')
    .addCommand(featuresCommand(factory))
    .addCommand(providersCommand(factory))
    .addCommand(checkCommand(factory))
    .addCommand(factsCommand(factory))
    .addCommand(logCommand(factory));
}
