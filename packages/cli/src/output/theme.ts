import chalk, { type ChalkInstance } from 'chalk';

export const t = {
  blue: chalk.hex('#4FC3F7'),
  text: chalk.hex('#C8C8C0'),
  white: chalk.hex('#F2F2EC'),
  dim: chalk.hex('#444444'),
  muted: chalk.hex('#666666'),
  amber: chalk.hex('#D4880A'),
  green: chalk.hex('#81C784'),
  red: chalk.hex('#CF6679'),
} as const;

const eventColors: Record<string, ChalkInstance> = {
  'feature.declared': t.blue,
  'bundle.built': t.muted,
  'capability.declared': t.green,
  'confine.extended': t.amber,
  'provider.registered': t.text,
  'provider.unsuitable': t.red,
};

export const eventColor = (event: string): ChalkInstance => eventColors[event] ?? t.muted;

export const suitabilityMark = (suitable: boolean): string => (suitable ? t.green('●') : t.dim('○'));
