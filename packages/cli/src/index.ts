/**
 * @warden/cli
 *
 * Warden operator command-line interface.
 *
 * Usage:
 *   warden features <type>
 *   warden providers <type> [--json]
 *   warden check <type> <provider> [features...] [--json]
 *   warden facts [--json]
 *   warden log [--type <type>] [--provider <name>] [--event <kind>] [--limit <n>] [--json]
 */

export { createProgram } from './commands/index.js';
export type { RuntimeEnvironment, RuntimeFactory, RuntimeOptions, WardenRuntime } from './runtime.js';
export { buildRuntime, createRuntime } from './runtime.js';
export type { CheckResult } from './output/check.js';
export { renderCheck } from './output/check.js';
export { renderFacts } from './output/facts.js';
export { renderLog } from './output/log.js';
export { renderSuitability } from './output/providers.js';
