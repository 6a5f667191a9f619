/**
 * Rigging Runtime Host — RIGGING_HOME Resolution
 *
 * Resolves the rigging home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. RIGGING_HOME environment variable
 *   3. OS application config file (last home chosen with --home --persist)
 *   4. Default: ~/.rigging
 *
 * Layout under the resolved home:
 *
 *   <RIGGING_HOME>/
 *     state/   configuration objects and simulated service state (JSON)
 *     logs/    changes.jsonl
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';

export const RIGGING_HOME_ENV = 'RIGGING_HOME';

// ---------------------------------------------------------------------------
// OS Config File
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the rigging application config file.
 *
 *   macOS:   ~/Library/Preferences/rigging/config.json
 *   Windows: %APPDATA%\rigging\config.json
 *   Linux:   ~/.config/rigging/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'rigging', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'rigging', 'config.json');
    }
    default:
      return join(home, '.config', 'rigging', 'config.json');
  }
}

/**
 * Read the persisted home path. Returns null if the file is absent,
 * unreadable, or has no non-empty `riggingHome` string.
 */
export function readRiggingHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('riggingHome' in parsed)) {
    return null;
  }
  const { riggingHome } = parsed;
  return typeof riggingHome === 'string' && riggingHome !== '' ? riggingHome : null;
}

export function writeRiggingHomeToConfig(riggingHome: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ riggingHome }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface ResolveRiggingHomeOptions {
  /** Explicit override; highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Environment to read RIGGING_HOME from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Location of the OS config file. Default: getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the rigging home directory, creating it if needed.
 *
 * @returns The path to the resolved home directory
 */
export function resolveRiggingHome(opts: ResolveRiggingHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? getOsConfigPath();
  const fromEnv = env[RIGGING_HOME_ENV];

  let riggingHome: string;
  if (typeof opts.home === 'string' && opts.home !== '') {
    riggingHome = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    riggingHome = fromEnv;
  } else {
    riggingHome = readRiggingHomeFromConfig(configPath) ?? join(homedir(), '.rigging');
  }

  if (!existsSync(riggingHome)) {
    mkdirSync(riggingHome, { recursive: true });
  }

  if (opts.persist === true) {
    writeRiggingHomeToConfig(riggingHome, configPath);
  }

  return riggingHome;
}
