/**
 * Warden Kernel — Confinement Logger
 *
 * Records definition-time events: features declared on a type, capability
 * bundles synthesized, capabilities declared or extended by a provider,
 * providers registered or found unsuitable.
 *
 * Boolean capability checks never log. They are pure reads, and their
 * detailed reasons are available through summary() and failures() only.
 *
 * The logger accepts an injected LogSink for persistence. If no sink is
 * injected (e.g., in tests), record() is a no-op.
 */

import type { LogSink } from './log-sink.js';

export const CONFINEMENT_EVENT_KINDS = [
  'feature.declared',
  'bundle.built',
  'capability.declared',
  'confine.extended',
  'provider.registered',
  'provider.unsuitable',
] as const;

export type ConfinementEventKind = (typeof CONFINEMENT_EVENT_KINDS)[number];

export function isConfinementEventKind(value: unknown): value is ConfinementEventKind {
  return CONFINEMENT_EVENT_KINDS.some((kind) => kind === value);
}

export interface ConfinementEvent {
  /** ISO-8601 timestamp. */
  readonly timestamp: string;
  readonly event: ConfinementEventKind;
  /** Resource type name. */
  readonly type: string;
  readonly provider?: string | undefined;
  /** Feature or capability names the event concerns. */
  readonly names?: ReadonlyArray<string> | undefined;
  /** Failure summary or other diagnostic payload. */
  readonly detail?: Readonly<Record<string, unknown>> | undefined;
}

export type ConfinementEventInput = Omit<ConfinementEvent, 'timestamp'>;

/**
 * Records confinement events to an optional sink.
 */
export class ConfinementLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  record(event: ConfinementEventInput): void {
    this.sink?.append({ timestamp: this.clock(), ...event });
  }
}

/** A logger without a sink. Shared default for pure, in-memory use. */
export const SILENT_LOGGER = new ConfinementLogger();
