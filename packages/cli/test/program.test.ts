/**
 * Rigging CLI — Program Tests
 *
 * Each test parses argv against a fresh program over an in-memory runtime
 * with a fixed clock and sequential event ids. Output goes to buffers and
 * is rendered with the plain theme.
 *
 * cli/scripts: analyzer reports, toggles, persistence and change logging.
 * cli/sink: target config queries and edits.
 * cli/process: install, then process actions with the status follow-up.
 * cli/history: listing, filtering and warnings for the change log.
 * cli/describe: grammar descriptions.
 * cli/errors: usage failures and display exits.
 */

import { describe, it, expect } from 'vitest';
import { UsageError, hashGrammar } from '@rigging/kernel';
import { CHANGE_LOG_FILE, MemoryStateIO } from '@rigging/runtime-host';
import { SCRIPTS_FILE, SINK_FILE } from '@rigging/module-sensor';
import { buildRuntime } from '../src/catalog.js';
import type { CliRuntime } from '../src/catalog.js';
import { createProgram, runProgram } from '../src/commands/index.js';
import { CommandFailedError } from '../src/grammar/parse.js';
import type { CliIO } from '../src/output/io.js';
import { plain } from '../src/output/theme.js';

const NOW = '2026-01-01T00:00:00.000Z';

interface Harness {
  readonly stateIO: MemoryStateIO;
  readonly runtime: CliRuntime;
  readonly out: string[];
  readonly err: string[];
  readonly io: CliIO;
  run(...argv: string[]): Promise<unknown>;
  exitCode(...argv: string[]): Promise<number>;
}

function harness(stateIO = new MemoryStateIO()): Harness {
  let next = 0;
  const runtime = buildRuntime(stateIO, {
    clock: () => new Date(NOW),
    nextId: () => `evt-${String(++next).padStart(3, '0')}`,
  });
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (text) => {
      out.push(text);
    },
    err: (text) => {
      err.push(text);
    },
  };
  // Commander keeps option values between parses; build a program per run.
  const program = () => createProgram({ runtime, io, theme: plain });
  return {
    stateIO,
    runtime,
    out,
    err,
    io,
    run: (...argv) => program().parseAsync(argv, { from: 'user' }),
    exitCode: (...argv) => runProgram(program(), argv, io, plain),
  };
}

async function failure(promise: Promise<unknown>): Promise<CommandFailedError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CommandFailedError) return error;
    throw error;
  }
  throw new Error('expected the command to fail');
}

function lines(text: string | undefined): string[] {
  return (text ?? '').split('\n');
}

// ---------------------------------------------------------------------------
// scripts
// ---------------------------------------------------------------------------

describe('cli/scripts', () => {
  it('prints every script as a table when no ids are given', async () => {
    const h = harness();
    await h.run('sensor', 'scripts');

    expect(h.out).toHaveLength(1);
    const table = lines(h.out[0]);
    // top rule, header, header rule, 12 rows, 11 row rules, bottom rule
    expect(table).toHaveLength(27);
    expect(table[1]).toBe(`│ Id │ ${'Name'.padEnd(38)} │ Enabled │ Value │`);
    expect(table[3]).toBe(`│  1 │ ${'base/protocols/conn'.padEnd(38)} │ true    │ N/A   │`);
    expect(table[11]).toBe(`│  5 │ ${'base/protocols/ssh'.padEnd(38)} │ false   │ N/A   │`);
    expect(h.stateIO.readLines(CHANGE_LOG_FILE)).toEqual([]);
  });

  it('enables the selected scripts, persists them and logs the change set', async () => {
    const h = harness();
    await h.run('sensor', 'scripts', '--ids', '5', '8', '--enable');

    expect(h.out).toEqual([
      [
        '2 changes applied',
        '  [5] base/protocols/ssh: enabled false → true',
        '  [8] policy/protocols/conn/known-hosts: enabled false → true',
      ].join('\n'),
    ]);

    const persisted = h.stateIO.readJson<{ analyzers: Array<{ id: number; enabled: boolean }> }>(SCRIPTS_FILE, {
      analyzers: [],
    });
    expect(persisted.analyzers.filter((a) => a.enabled).map((a) => a.id)).toEqual([1, 2, 3, 4, 5, 8]);

    const logged = h.stateIO.readLines(CHANGE_LOG_FILE);
    expect(logged).toHaveLength(1);
    expect(JSON.parse(logged[0] ?? '')).toEqual({
      event_id: 'evt-001',
      timestamp: NOW,
      interface_name: 'sensor scripts',
      changes: [
        {
          kind: 'analyzer',
          id: 5,
          name: 'base/protocols/ssh',
          before: { enabled: false, value: null },
          after: { enabled: true, value: null },
        },
        {
          kind: 'analyzer',
          id: 8,
          name: 'policy/protocols/conn/known-hosts',
          before: { enabled: false, value: null },
          after: { enabled: true, value: null },
        },
      ],
    });
  });

  it('reports ids that match nothing as an empty change set', async () => {
    const h = harness();
    await h.run('sensor', 'scripts', '--ids', '99', '--disable');

    expect(h.out).toEqual(['No matching items; nothing changed.']);
    expect(h.stateIO.readLines(CHANGE_LOG_FILE)).toHaveLength(1);
  });

  it('derives later runs from the persisted state', async () => {
    const stateIO = new MemoryStateIO();
    await harness(stateIO).run('sensor', 'scripts', '--ids', '1', '--disable');

    const h = harness(stateIO);
    await h.run('sensor', 'scripts');
    expect(lines(h.out[0])[3]).toBe(`│  1 │ ${'base/protocols/conn'.padEnd(38)} │ false   │ N/A   │`);
  });
});

// ---------------------------------------------------------------------------
// sink
// ---------------------------------------------------------------------------

describe('cli/sink', () => {
  it('reports the current configuration when nothing is set', async () => {
    const h = harness();
    await h.run('sensor', 'sink');

    const table = lines(h.out[0]);
    expect(table[1]).toBe('│ Config Option  │ Value         │');
    expect(table[3]).toBe('│ target-strings │ N/A           │');
    expect(table[5]).toBe('│ index          │ sensor-events │');
    expect(table[7]).toBe('│ max-batch-size │          2048 │');
    expect(table[9]).toBe('│ timeout        │            90 │');
    expect(table[11]).toBe('│ enabled        │ false         │');
    expect(h.stateIO.readLines(CHANGE_LOG_FILE)).toEqual([]);
  });

  it('assigns values, enables the sink and persists it', async () => {
    const h = harness();
    await h.run('sensor', 'sink', '--target-strings', '10.0.0.5:5044', '10.0.0.6:5044', '--enable');

    expect(h.out).toEqual([
      ['2 changes applied', '  target_strings: N/A → 10.0.0.5:5044, 10.0.0.6:5044', '  enabled: false → true'].join(
        '\n',
      ),
    ]);
    expect(h.stateIO.readJson(SINK_FILE, {})).toEqual({
      enabled: true,
      values: {
        target_strings: ['10.0.0.5:5044', '10.0.0.6:5044'],
        index: 'sensor-events',
        max_batch_size: 2048,
        timeout: 90,
      },
    });
  });

  it('coerces numeric fields before assigning them', async () => {
    const h = harness();
    await h.run('sensor', 'sink', '--max-batch-size', '512', '--timeout', '2.5');

    expect(h.out).toEqual(
      [['2 changes applied', '  max_batch_size: 2048 → 512', '  timeout: 90 → 2.5'].join('\n')],
    );
  });
});

// ---------------------------------------------------------------------------
// install and process
// ---------------------------------------------------------------------------

describe('cli/process', () => {
  it('installs silently, then prints the status after start', async () => {
    const h = harness();
    await h.run('sensor', 'install', '--network-interfaces', 'eth0', 'eth1');
    expect(h.out).toEqual([]);

    await h.run('sensor', 'process', 'start');
    expect(h.out).toEqual([JSON.stringify({ service: 'sensor', running: true, started_at: NOW }, null, 2)]);
  });

  it('prints the status once for the status action', async () => {
    const h = harness();
    await h.run('sensor', 'install', '--network-interfaces', 'eth0', '--install-directory', '/srv/sensor');
    await h.run('sensor', 'process', 'status', '--verbose');

    expect(h.out).toHaveLength(1);
    expect(JSON.parse(h.out[0] ?? '')).toEqual({
      service: 'sensor',
      running: false,
      started_at: null,
      install_directory: '/srv/sensor',
      network_interfaces: ['eth0'],
    });
  });

  it('pretty-prints the status on request', async () => {
    const h = harness();
    await h.run('sensor', 'install', '--network-interfaces', 'eth0');
    await h.run('sensor', 'process', 'start', '--pretty-print-status');

    expect(h.out).toEqual([`sensor: running\n  since: ${NOW}`]);
  });

  it('reports a missing installation with the command path', async () => {
    const h = harness();
    expect(await h.exitCode('sensor', 'process', 'status')).toBe(1);
    expect(h.err).toEqual(["[rig sensor process] sensor is not installed. Install it with 'rig sensor install -h'"]);
  });

  it('requires the network interfaces', async () => {
    const h = harness();
    const error = await failure(h.run('sensor', 'install'));
    expect(error.commandPath).toBe('sensor install');
    expect(error.error).toBeInstanceOf(UsageError);
    expect(error.message).toBe('the following arguments are required: --network-interfaces');
  });

  it('rejects a missing or unknown action', async () => {
    const h = harness();
    const missing = await failure(h.run('sensor', 'process'));
    expect(missing.message).toBe("process: an action is required (choose from 'start', 'stop', 'restart', 'status')");

    const unknown = await failure(h.run('sensor', 'process', 'reload'));
    expect(unknown.message).toBe(
      "process: invalid action 'reload' (choose from 'start', 'stop', 'restart', 'status')",
    );
  });
});

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

describe('cli/history', () => {
  it('says so when nothing was recorded', async () => {
    const h = harness();
    await h.run('history');
    expect(h.out).toEqual(['No changes recorded.']);
  });

  it('lists recorded passes as a table', async () => {
    const h = harness();
    await h.run('sensor', 'scripts', '--ids', '5', '--enable');
    h.out.length = 0;
    await h.run('history');

    const table = lines(h.out[0]);
    expect(table[1]).toBe(
      `│ ${'Timestamp'.padEnd(24)} │ ${'Interface'.padEnd(14)} │ ${'Changes'.padEnd(44)} │`,
    );
    expect(table[3]).toBe(`│ ${NOW} │ sensor scripts │ [5] base/protocols/ssh: enabled false → true │`);
  });

  it('filters by interface and limits to the most recent passes', async () => {
    const h = harness();
    await h.run('sensor', 'scripts', '--ids', '5', '--enable');
    await h.run('sensor', 'sink', '--index', 'lab');
    await h.run('sensor', 'scripts', '--ids', '6', '--enable');
    h.out.length = 0;

    await h.run('history', '--interface', 'sensor scripts', '--limit', '1', '--json');
    expect(h.out).toHaveLength(1);
    expect(JSON.parse(h.out[0] ?? '')).toMatchObject({ event_id: 'evt-003', interface_name: 'sensor scripts' });
  });

  it('warns about lines it cannot read', async () => {
    const h = harness();
    h.stateIO.appendLine(CHANGE_LOG_FILE, 'not json');
    await h.run('history');

    expect(h.err).toEqual(['[rig history] skipped 1 malformed line(s)']);
    expect(h.out).toEqual(['No changes recorded.']);
  });

  it('rejects a limit that is not a positive integer', async () => {
    const h = harness();
    const error = await failure(h.run('history', '--limit', '0'));
    expect(error.commandPath).toBe('history');
    expect(error.message).toMatch(/Expected a positive integer\.$/);
  });
});

// ---------------------------------------------------------------------------
// describe
// ---------------------------------------------------------------------------

describe('cli/describe', () => {
  it('prints each flag, then the grammar fingerprint', async () => {
    const h = harness();
    await h.run('describe', 'sensor', 'scripts');

    const entry = h.runtime.registry.get('sensor', 'scripts');
    expect(entry).toBeDefined();
    expect(h.out).toEqual([
      '{"dest":"analyzer_ids","flags":["--ids"],"required":false,"value_type":"int","multiplicity":"many",' +
        '"help_text":"Specify one or more ids for the config object you want to work with.","default":[]}',
      '{"dest":"enable","flags":["--enable"],"required":false,"value_type":"none","multiplicity":"single",' +
        '"help_text":"Enable selected object."}',
      '{"dest":"disable","flags":["--disable"],"required":false,"value_type":"none","multiplicity":"single",' +
        '"help_text":"Disable selected object."}',
      `grammar: ${entry === undefined ? '' : hashGrammar(entry.iface.grammar())}`,
    ]);
  });

  it('lists the action choices of a process interface', async () => {
    const h = harness();
    await h.run('describe', 'sensor', 'process');
    expect(h.out[2]).toBe('action: start | stop | restart | status');
  });

  it('names the registered components for an unknown one', async () => {
    const h = harness();
    const error = await failure(h.run('describe', 'router', 'process'));
    expect(error.message).toBe("unknown component 'router' (available: sensor)");
  });

  it('names the available interfaces for an unknown one', async () => {
    const h = harness();
    const error = await failure(h.run('describe', 'sensor', 'nope'));
    expect(error.commandPath).toBe('describe');
    expect(error.message).toBe(
      "unknown interface 'sensor nope' (available: sensor install, sensor process, sensor scripts, sensor sink)",
    );
  });
});

// ---------------------------------------------------------------------------
// errors and display exits
// ---------------------------------------------------------------------------

describe('cli/errors', () => {
  it('turns unknown options into usage errors', async () => {
    const h = harness();
    const error = await failure(h.run('sensor', 'scripts', '--frobnicate'));
    expect(error.commandPath).toBe('sensor scripts');
    expect(error.error).toBeInstanceOf(UsageError);
    expect(error.message).toMatch(/^unknown option '--frobnicate'/);
  });

  it('rejects values that are not of the flag type', async () => {
    const h = harness();
    const error = await failure(h.run('sensor', 'scripts', '--ids', 'five'));
    expect(error.message).toBe("--ids: invalid int value: 'five'");
  });

  it('prints failures in the [rig <command>] form and exits non-zero', async () => {
    const h = harness();
    expect(await h.exitCode('sensor', 'scripts', '--ids', 'five')).toBe(1);
    expect(h.err).toEqual(["[rig sensor scripts] --ids: invalid int value: 'five'"]);
  });

  it('treats help and version as successful exits', async () => {
    const h = harness();
    expect(await h.exitCode('--version')).toBe(0);
    expect(h.out).toEqual(['0.1.0']);

    h.out.length = 0;
    expect(await h.exitCode('sensor', 'process', '--help')).toBe(0);
    expect(lines(h.out[0])[0]).toBe('Usage: rig sensor process [options] [action]');
    expect(h.err).toEqual([]);
  });
});
