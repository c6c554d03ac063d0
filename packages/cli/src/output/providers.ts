import type { SuitabilityReport } from '@warden/provider-loader';
import { suitabilityMark, t } from './theme.js';

/**
 * One row per provider: suitability mark, name, capabilities, and the
 * failure lines of an unsuitable provider indented below it.
 */
export function renderSuitability(report: SuitabilityReport): string {
  let out = `\n  ${t.muted('providers of')} ${t.white(report.type)}\n\n`;
  if (report.providers.length === 0) {
    return out + `    ${t.dim('(none)')}\n`;
  }

  const nameWidth = Math.max(...report.providers.map((p) => p.provider.length)) + 2;
  for (const entry of report.providers) {
    const name = entry.suitable ? t.white(entry.provider) : t.muted(entry.provider);
    const pad = ' '.repeat(nameWidth - entry.provider.length);
    const capabilities =
      entry.capabilities.length > 0 ? t.text(entry.capabilities.join(' ')) : t.dim('no capabilities');
    out += `    ${suitabilityMark(entry.suitable)} ${name}${pad}${capabilities}\n`;
    for (const failure of entry.failures) {
      out += `        ${t.red(failure)}\n`;
    }
  }
  return out;
}
