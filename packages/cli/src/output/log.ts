import type { ConfinementLogEntry } from '@warden/runtime-host';
import { eventColor, t } from './theme.js';

/** Width of the longest event kind. */
const EVENT_WIDTH = 'capability.declared'.length;

export function renderLog(entries: ReadonlyArray<ConfinementLogEntry>): string {
  if (entries.length === 0) return `  ${t.dim('(no events)')}\n`;

  return entries
    .map((entry) => {
      const subject = entry.provider === undefined ? entry.type : `${entry.type}::${entry.provider}`;
      const names = entry.names !== undefined && entry.names.length > 0 ? `  ${t.text(entry.names.join(','))}` : '';
      return `${t.dim(entry.timestamp)}  ${eventColor(entry.event)(entry.event.padEnd(EVENT_WIDTH))}  ${subject}${names}\n`;
    })
    .join('');
}
