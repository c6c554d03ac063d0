/**
 * Warden Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for reading and writing JSON state files
 * and appending to JSONL log files under the warden home.
 *
 * Two implementations are provided:
 *   - FileStateIO: durable file I/O under a warden home directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded use
 *
 * Operator configuration (facts.json, features.json) and the confinement
 * log are read and written through StateIO only, so every consumer can be
 * tested without touching the file system.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the home
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - Files from one StateIO instance cannot be accessed from another
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * The content is returned as `unknown`: callers validate it before use.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'facts.json')
   * @returns The parsed value, or undefined when the file is absent or not valid JSON
   */
  readJson(filename: string): unknown;

  /**
   * Raw text of a state file, or undefined when it does not exist.
   * Callers that must tell an absent file from a malformed one parse this.
   */
  readText(filename: string): string | undefined;

  /**
   * Write raw text to a state file, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeText(filename: string, text: string): void;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line to a log file. A newline is written after the line.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'confinement.jsonl')
   * @param line - Line content, without trailing newline
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text content of a log file, or '' when it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO for a warden home directory.
 *
 * Reads JSON state from  `<home>/state/<filename>`.
 * Appends log lines to   `<home>/logs/<logfilename>`.
 *
 * ENOENT is recoverable (undefined / ''), and readJson also maps a
 * SyntaxError to undefined. Other I/O
 * errors are rethrown: the operator must address them.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    return parseOrUndefined(this.readText(filename));
  }

  writeJson(filename: string, value: unknown): void {
    this.writeText(filename, JSON.stringify(value, null, 2));
  }

  readText(filename: string): string | undefined {
    try {
      return readFileSync(join(this.homeDir, 'state', filename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeText(filename: string, text: string): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), text, 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. No file system access.
 *
 * State files are held as the text FileStateIO would write, so values
 * round-trip through JSON (undefined values are dropped, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    return parseOrUndefined(this.store.get(filename));
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value, null, 2));
  }

  readText(filename: string): string | undefined {
    return this.store.get(filename);
  }

  writeText(filename: string, text: string): void {
    this.store.set(filename, text);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Every line appended to a log file. Specific to MemoryStateIO; tests use
   * it to check log output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Same shape as the file: 'a\nb\n'
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Parsed JSON, or undefined for absent or unparseable text. */
function parseOrUndefined(text: string | undefined): unknown {
  if (text === undefined) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/** Whether an unknown error is a Node.js errno exception with the given code. */
function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
