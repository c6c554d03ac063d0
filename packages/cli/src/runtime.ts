/**
 * Warden CLI — Runtime
 *
 * Wires the host, the registry and the first-party modules together for
 * one CLI invocation. Commands receive a RuntimeFactory so tests can hand
 * them an in-memory runtime.
 */

import type { FactTable, HostEnvironment } from '@warden/confine';
import { ConfinementLogger } from '@warden/kernel';
import { registerPackageModule } from '@warden/module-package';
import { TypeRegistry } from '@warden/provider-loader';
import {
  FileLogSink,
  FileStateIO,
  NodeHostEnvironment,
  resolveWardenHome,
  type StateIO,
} from '@warden/runtime-host';

export type RuntimeEnvironment = HostEnvironment & FactTable;

export interface WardenRuntime {
  readonly stateIO: StateIO;
  readonly environment: RuntimeEnvironment;
  readonly registry: TypeRegistry;
}

export interface RuntimeOptions {
  /** --home value; resolution falls back to WARDEN_HOME, the OS config, ~/.warden. */
  readonly home?: string | undefined;
}

export type RuntimeFactory = (options: RuntimeOptions) => WardenRuntime;

/**
 * Register every first-party module against the given host. Definition
 * events go to the confinement log through the state's FileLogSink
 * unless another logger is given.
 */
export function createRuntime(
  stateIO: StateIO,
  environment: RuntimeEnvironment,
  logger: ConfinementLogger = new ConfinementLogger(new FileLogSink(stateIO)),
): WardenRuntime {
  const registry = new TypeRegistry();
  registerPackageModule(registry, { environment, logger });
  return { stateIO, environment, registry };
}

/**
 * The production runtime: file-backed state under the resolved home and
 * the real host.
 *
 * @throws {HostConfigurationError} If facts.json or features.json is malformed
 */
export function buildRuntime(options: RuntimeOptions = {}): WardenRuntime {
  const stateIO = new FileStateIO(resolveWardenHome({ home: options.home }));
  return createRuntime(stateIO, NodeHostEnvironment.fromState(stateIO));
}
