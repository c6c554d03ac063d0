import { InvalidArgumentError, type Command } from 'commander';
import type { RuntimeFactory, WardenRuntime } from '../runtime.js';

/** Build the runtime with the program-level --home option, if any. */
export function runtimeFor(command: Command, factory: RuntimeFactory): WardenRuntime {
  const home: unknown = command.optsWithGlobals()['home'];
  return factory({ home: typeof home === 'string' ? home : undefined });
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
