import type { FactValue } from '@warden/confine';
import { t } from './theme.js';

export function renderFacts(facts: ReadonlyArray<readonly [string, FactValue]>): string {
  if (facts.length === 0) return `  ${t.dim('(no facts)')}\n`;

  const width = Math.max(...facts.map(([name]) => name.length));
  return facts.map(([name, value]) => `  ${t.muted(name.padEnd(width))}  ${t.white(String(value))}\n`).join('');
}
