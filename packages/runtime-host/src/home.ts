/**
 * Warden Runtime Host — Warden Home Resolution
 *
 * Resolves the warden home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. WARDEN_HOME environment variable
 *   3. OS application config file (last home persisted by an explicit override)
 *   4. Default: ~/.warden
 *
 * Layout of the home:
 *
 *   <WARDEN_HOME>/
 *     state/
 *       facts.json       operator fact overrides
 *       features.json    global features known to be available
 *     logs/
 *       confinement.jsonl
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the warden application config file.
 *
 *   macOS:   ~/Library/Preferences/warden/config.json
 *   Windows: %APPDATA%\warden\config.json
 *   Linux:   $XDG_CONFIG_HOME/warden/config.json (default ~/.config)
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'warden', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'warden', 'config.json');
    }
    default: {
      const xdg = process.env['XDG_CONFIG_HOME'];
      const base = xdg !== undefined && xdg !== '' ? xdg : join(home, '.config');
      return join(base, 'warden', 'config.json');
    }
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * The persisted home path, or null when the config file is absent,
 * unreadable, or has no non-empty `home` string.
 */
export function readWardenHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('home' in parsed)) return null;
  return typeof parsed.home === 'string' && parsed.home !== '' ? parsed.home : null;
}

/** Persist a home path to the OS config file. */
export function writeWardenHomeToConfig(
  home: string,
  configPath: string = getOsConfigPath(),
): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface ResolveWardenHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Config file location. Default: getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the warden home directory and create it if missing.
 *
 * @returns The resolved home directory
 */
export function resolveWardenHome(opts?: ResolveWardenHomeOptions): string {
  const configPath = opts?.configPath ?? getOsConfigPath();
  const fromEnv = process.env['WARDEN_HOME'];

  let home: string;
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readWardenHomeFromConfig(configPath) ?? join(homedir(), '.warden');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  if (opts?.persist === true) {
    writeWardenHomeToConfig(home, configPath);
  }
  return home;
}
