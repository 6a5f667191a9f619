/**
 * Rigging Target Loader — TargetLoader and InterfaceRegistry Tests
 *
 *   L1: loaded interfaces are registered under component and name
 *   L2: invalid manifests throw InvalidManifestError and register nothing
 *   L3: build-time errors from the assembler propagate
 *   L4: duplicate names within a component are rejected
 *   L5: config interfaces carry a commit bound to their object
 *   L6: components and their interfaces list in registration order
 */

import { describe, it, expect } from 'vitest';
import {
  AnalyzersInterface,
  InvalidManifestError,
  ParamType,
  UnknownOperationError,
} from '@rigging/kernel';
import type { AnalyzerCollection, TargetManifest } from '@rigging/kernel';
import { InterfaceRegistry } from '../src/registry.js';
import { TargetLoader } from '../src/loader.js';

class Lamp {
  on = false;
  constructor(readonly room: string) {}
}

const LAMP: TargetManifest<Lamp> = {
  layer_id: 'lamp',
  description: 'Control a lamp',
  constructor_params: [{ name: 'room', type: ParamType.String }],
  create: (args) => new Lamp(String(args['room'])),
  operations: [
    { name: 'switch_on', params: [], run: (lamp) => (lamp.on = true) },
    { name: 'switch_off', params: [], run: (lamp) => (lamp.on = false) },
    { name: 'status', params: [], run: (lamp) => (lamp.on ? 'on' : 'off') },
  ],
};

function setup(): { registry: InterfaceRegistry; loader: TargetLoader } {
  const registry = new InterfaceRegistry();
  return { registry, loader: new TargetLoader(registry) };
}

describe('TargetLoader', () => {
  it('L1: registers a multiple-responsibility interface', () => {
    const { registry, loader } = setup();
    const iface = loader.loadMultiple('home', LAMP, { name: 'lamp', operations: ['switch_on', 'switch_off'] });
    expect(iface.actions()).toEqual(['switch-on', 'switch-off']);
    const entry = registry.get('home', 'lamp');
    expect(entry?.kind).toBe('manager');
    expect(entry?.iface).toBe(iface);
    expect(iface.description).toBe('Control a lamp');
  });

  it('L1: registers a single-responsibility interface', () => {
    const { registry, loader } = setup();
    loader.loadSingle('home', LAMP, { name: 'lamp-status', entry: 'status' });
    expect(registry.get('home', 'lamp-status')?.iface.name).toBe('lamp-status');
  });

  it('L2: throws InvalidManifestError for an invalid manifest', () => {
    const { registry, loader } = setup();
    const broken: TargetManifest<Lamp> = {
      ...LAMP,
      constructor_params: [{ name: 'room', type: ParamType.String, default: 3 }],
    };
    expect(() => loader.loadMultiple('home', broken, { name: 'lamp', operations: [] })).toThrow(
      InvalidManifestError,
    );
    expect(registry.list()).toEqual([]);
  });

  it('L2: lists every validation error in the message', () => {
    const { loader } = setup();
    const broken: TargetManifest<Lamp> = {
      ...LAMP,
      constructor_params: [{ name: 'room', type: ParamType.String, default: 3 }],
    };
    expect(() => loader.loadSingle('home', broken, { name: 'lamp', entry: 'status' })).toThrow(
      'Manifest "lamp" is invalid:\n  - Default of "room" does not match its type string: 3',
    );
  });

  it('L3: propagates UnknownOperationError for a missing entry', () => {
    const { registry, loader } = setup();
    expect(() => loader.loadSingle('home', LAMP, { name: 'lamp', entry: 'dim' })).toThrow(UnknownOperationError);
    expect(registry.list()).toEqual([]);
  });

  it('L4: rejects a second interface with the same name in one component', () => {
    const { loader } = setup();
    loader.loadSingle('home', LAMP, { name: 'lamp', entry: 'status' });
    expect(() => loader.loadSingle('home', LAMP, { name: 'lamp', entry: 'status' })).toThrow(
      'Interface "lamp" is already registered for component "home"',
    );
  });

  it('L4: allows the same name in different components', () => {
    const { registry, loader } = setup();
    loader.loadSingle('home', LAMP, { name: 'lamp', entry: 'status' });
    loader.loadSingle('office', LAMP, { name: 'lamp', entry: 'status' });
    expect(registry.list()).toHaveLength(2);
  });

  it('L5: commit receives the configuration object', () => {
    const { registry, loader } = setup();
    const collection: AnalyzerCollection = { analyzers: [{ id: 1, name: 'dns', enabled: false }] };
    const committed: AnalyzerCollection[] = [];
    loader.loadConfig('home', new AnalyzersInterface(collection, { name: 'scripts' }), (config) =>
      committed.push(config),
    );
    const entry = registry.get('home', 'scripts');
    expect(entry?.kind).toBe('config');
    if (entry?.kind === 'config') {
      entry.commit();
    }
    expect(committed).toEqual([collection]);
    expect(committed[0]).toBe(collection);
  });
});

describe('InterfaceRegistry', () => {
  it('L6: lists components and their interfaces in registration order', () => {
    const { registry, loader } = setup();
    loader.loadSingle('office', LAMP, { name: 'desk', entry: 'status' });
    loader.loadSingle('home', LAMP, { name: 'hall', entry: 'status' });
    loader.loadSingle('office', LAMP, { name: 'ceiling', entry: 'status' });
    expect(registry.components()).toEqual(['office', 'home']);
    expect(registry.forComponent('office').map((entry) => entry.iface.name)).toEqual(['desk', 'ceiling']);
  });

  it('returns undefined for an unknown interface', () => {
    expect(new InterfaceRegistry().get('home', 'lamp')).toBeUndefined();
  });
});
