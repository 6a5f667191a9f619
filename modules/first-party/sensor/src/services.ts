/**
 * Rigging First-Party Sensor Module — Service Table
 *
 * The sample targets never touch the host. Installation and process state
 * is a record per service in `services.json`, read and written through the
 * injected StateIO.
 */

import type { StateIO } from '@rigging/runtime-host';

export const SERVICES_FILE = 'services.json';

export interface ServiceRecord {
  readonly installed: boolean;
  readonly running: boolean;
  readonly install_directory: string | null;
  readonly network_interfaces: ReadonlyArray<string>;
  readonly threads: number | null;
  readonly started_at: string | null;
}

export const EMPTY_SERVICE_RECORD: ServiceRecord = {
  installed: false,
  running: false,
  install_directory: null,
  network_interfaces: [],
  threads: null,
  started_at: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function toServiceRecord(value: unknown): ServiceRecord {
  if (!isRecord(value)) {
    return EMPTY_SERVICE_RECORD;
  }
  const interfaces = value['network_interfaces'];
  const threads = value['threads'];
  return {
    installed: value['installed'] === true,
    running: value['running'] === true,
    install_directory: stringOrNull(value['install_directory']),
    network_interfaces: Array.isArray(interfaces)
      ? interfaces.filter((item): item is string => typeof item === 'string')
      : [],
    threads: typeof threads === 'number' ? threads : null,
    started_at: stringOrNull(value['started_at']),
  };
}

export class ServiceTable {
  constructor(
    private readonly stateIO: StateIO,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get(service: string): ServiceRecord {
    const table = this.stateIO.readJson<unknown>(SERVICES_FILE, {});
    return isRecord(table) ? toServiceRecord(table[service]) : EMPTY_SERVICE_RECORD;
  }

  update(service: string, patch: Partial<ServiceRecord>): ServiceRecord {
    const raw = this.stateIO.readJson<unknown>(SERVICES_FILE, {});
    const table = isRecord(raw) ? raw : {};
    const next: ServiceRecord = { ...toServiceRecord(table[service]), ...patch };
    this.stateIO.writeJson(SERVICES_FILE, { ...table, [service]: next });
    return next;
  }

  now(): string {
    return this.clock().toISOString();
  }
}
