/**
 * Warden Runtime Host — File-backed Confinement Log Sink
 *
 * Implements the LogSink interface from @warden/kernel by appending one
 * JSONL line per event to `logs/confinement.jsonl` under the warden home.
 *
 * The kernel owns the LogSink interface and the ConfinementLogger. This is
 * the only place in the system that writes confinement events to disk. The
 * write is synchronous and completes before append() returns.
 */

import type { ConfinementEvent, LogSink } from '@warden/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

/** Log file name within the logs subdirectory. */
export const CONFINEMENT_LOG = 'confinement.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = () => ulid(),
  ) {}

  append(event: ConfinementEvent): void {
    this.stateIO.appendLine(CONFINEMENT_LOG, JSON.stringify({ event_id: this.nextId(), ...event }));
  }
}
