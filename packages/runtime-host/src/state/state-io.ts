/**
 * Rigging Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading/writing JSON state
 * files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO:   durable file I/O under a rigging home directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded (non-persistent) use
 *
 * Configuration stores, the sample targets and the change log all inject
 * StateIO; none of them builds a path of its own.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the home
 * - appendLine and readLogRaw address the `logs/` subdirectory of the home
 * - Files from one StateIO instance cannot be accessed from another
 */
export interface StateIO {
  /**
   * Read a JSON file and parse it.
   *
   * Returns `fallback` if the file does not exist or cannot be parsed.
   * Type parameter T is trusted; callers validate persisted shapes they
   * cannot vouch for.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'sink.json')
   * @param fallback - Value to return if the file is absent or unreadable
   */
  readJson<T>(filename: string, fallback: T): T;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   */
  writeJson<T>(filename: string, value: T): void;

  /**
   * Append one line (a newline is added) to a log file.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or '' if it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO for one rigging home.
 *
 *   <home>/state/<filename>     JSON state
 *   <home>/logs/<logfilename>   JSONL logs
 *
 * Directories are created on demand. ENOENT and SyntaxError are recoverable
 * on read (fallback); other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, fallback: T): T {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
  }

  writeJson<T>(filename: string, value: T): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2), 'utf-8');
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
 * In-memory StateIO. Instances are isolated from each other.
 *
 * writeJson round-trips through JSON so reads see what FileStateIO would
 * return (undefined dropped, Dates as strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, unknown> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson<T>(filename: string, fallback: T): T {
    if (!this.store.has(filename)) {
      return fallback;
    }
    return this.store.get(filename) as T;
  }

  writeJson<T>(filename: string, value: T): void {
    this.store.set(filename, JSON.parse(JSON.stringify(value)) as unknown);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Test helper; not part of StateIO. */
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
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
