/**
 * Bastion Runtime Host — StateIO
 *
 * Injectable I/O for JSON state documents and append-only JSONL logs under
 * one home directory.
 *
 *   FileStateIO   — durable files under `<home>/state/` and `<home>/logs/`
 *   MemoryStateIO — in-memory, for tests and throwaway sessions
 *
 * readJson returns `unknown`: every caller validates what it reads before
 * trusting it.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - filenames are flat; callers never build absolute paths
 */
export interface StateIO {
  /**
   * Parsed JSON content of a state file, or undefined if the file is absent
   * or not valid JSON.
   */
  readJson(filename: string): unknown;

  /** Overwrite a state file with the JSON form of `value`. */
  writeJson(filename: string, value: unknown): void;

  /** Append `line` plus a newline to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw log content, or '' if the log has never been written. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * ENOENT and SyntaxError are recoverable (absent state). Any other I/O error
 * is rethrown for the operator to address.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
      return parsed;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
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
 * Instances are isolated from each other. writeJson round-trips through JSON
 * so tests see the same serialization FileStateIO would produce.
 */
export class MemoryStateIO implements StateIO {
  private readonly documents = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const raw = this.documents.get(filename);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  writeJson(filename: string, value: unknown): void {
    this.documents.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; used by tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
