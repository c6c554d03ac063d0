import { suitabilityMark, t } from './theme.js';

export interface CheckResult {
  readonly type: string;
  readonly provider: string;
  readonly suitable: boolean;
  readonly capabilities: ReadonlyArray<string>;
  /** Requested features the provider does not have. */
  readonly missing: ReadonlyArray<string>;
}

export function renderCheck(result: CheckResult): string {
  let out =
    `  ${suitabilityMark(result.suitable)} ${t.white(result.provider)} ${t.muted('of')} ${result.type}  ` +
    (result.suitable ? t.green('suitable') : t.red('unsuitable')) +
    '\n';
  out +=
    `  ${t.muted('capabilities')}  ` +
    (result.capabilities.length > 0 ? t.text(result.capabilities.join(' ')) : t.dim('(none)')) +
    '\n';
  if (result.missing.length > 0) {
    out += `  ${t.muted('missing')}       ${t.red(result.missing.join(' '))}\n`;
  }
  return out;
}
