/**
 * Warden Kernel — Log Sink Interface
 *
 * Defines the injection point for confinement event persistence.
 *
 * The kernel owns the contract (this interface) and the ConfinementLogger
 * class. Concrete implementations live in the runtime host layer and are
 * injected at construction time; the kernel never writes to disk directly.
 */

import type { ConfinementEvent } from './confinement-log.js';

/**
 * A sink that receives and persists confinement events.
 *
 * append() is called synchronously from definition-time operations
 * (declaring features, building bundles, registering providers).
 * Implementations must not silently discard entries.
 */
export interface LogSink {
  append(event: ConfinementEvent): void;
}
