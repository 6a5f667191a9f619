/**
 * Rigging Kernel — Descriptor Extraction Tests
 *
 * extract/constructor: typed constructor parameters become the base parameters;
 *   an untyped one is fatal for the whole target.
 * extract/operations: the layer chain is walked most-derived first and the
 *   first definition per name wins; untyped operations are skipped.
 *
 * All tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  extractOperations,
  extractParameter,
  extractTarget,
  MissingTypeAnnotationError,
  ParamType,
} from '../src/index.js';
import type { OperationLayer, TargetManifest } from '../src/index.js';
import { BASE_LAYER, FakeService, SERVICE_MANIFEST } from './fixtures/service-manifest.js';

// ---------------------------------------------------------------------------
// extract/constructor
// ---------------------------------------------------------------------------

describe('extract/constructor', () => {
  it('extracts typed constructor parameters in declaration order', () => {
    const descriptor = extractTarget(SERVICE_MANIFEST);
    expect(descriptor.base.parameters.map((p) => p.name)).toEqual(['host', 'verbose']);
    expect(descriptor.base.parameters[0]).toEqual({
      name: 'host',
      semantic_type: { kind: 'string' },
      default: undefined,
      description: 'Host to manage',
      is_reserved: false,
    });
  });

  it('defaults a missing description to the empty string', () => {
    const descriptor = extractTarget(SERVICE_MANIFEST);
    expect(descriptor.base.parameters[1]?.description).toBe('');
  });

  it('throws MissingTypeAnnotationError naming the target and parameter', () => {
    const manifest: TargetManifest<FakeService> = {
      ...SERVICE_MANIFEST,
      layer_id: 'untyped-service',
      constructor_params: [{ name: 'host', type: ParamType.String }, { name: 'mystery' }],
    };
    expect(() => extractTarget(manifest)).toThrow(MissingTypeAnnotationError);
    try {
      extractTarget(manifest);
    } catch (err) {
      expect(err).toBeInstanceOf(MissingTypeAnnotationError);
      if (err instanceof MissingTypeAnnotationError) {
        expect(err.code).toBe('MISSING_TYPE_ANNOTATION');
        expect(err.targetId).toBe('untyped-service');
        expect(err.parameter).toBe('mystery');
      }
    }
  });

  it('marks dispatch-control names as reserved', () => {
    expect(extractParameter({ name: 'action', type: ParamType.String })?.is_reserved).toBe(true);
    expect(extractParameter({ name: 'sub_interface', type: ParamType.String })?.is_reserved).toBe(true);
    expect(extractParameter({ name: 'host', type: ParamType.String })?.is_reserved).toBe(false);
  });

  it('returns null for an untyped parameter', () => {
    expect(extractParameter({ name: 'mystery' })).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// extract/operations
// ---------------------------------------------------------------------------

describe('extract/operations', () => {
  it('collects operations from every layer, most-derived first', () => {
    const descriptor = extractTarget(SERVICE_MANIFEST);
    expect([...descriptor.operations.keys()]).toEqual([
      'status',
      'start_all',
      'wait',
      'start',
      'stop',
      'restart',
      'configure',
    ]);
  });

  it('lets an override layer shadow the parent definition', () => {
    const descriptor = extractTarget(SERVICE_MANIFEST);
    expect(descriptor.operations.get('status')?.layer_id).toBe('fake-service');
    expect(descriptor.operations.get('start')?.layer_id).toBe('base-service');

    const service = new FakeService('10.0.0.5', false);
    expect(descriptor.operations.get('status')?.run(service, {})).toBe('status of 10.0.0.5');
  });

  it('skips an operation with an untyped parameter without failing', () => {
    const layer: OperationLayer<FakeService> = {
      layer_id: 'partial',
      operations: [
        { name: 'tune', params: [{ name: 'level' }], run: () => 'tuned' },
        { name: 'ping', params: [], run: () => 'pong' },
      ],
    };
    const { operations, skipped } = extractOperations(layer);
    expect([...operations.keys()]).toEqual(['ping']);
    expect(skipped).toEqual(['tune']);
  });

  it('lists skipped operations on the target descriptor', () => {
    const manifest: TargetManifest<FakeService> = {
      ...SERVICE_MANIFEST,
      operations: [...SERVICE_MANIFEST.operations, { name: 'tune', params: [{ name: 'level' }], run: () => 'tuned' }],
    };
    const descriptor = extractTarget(manifest);
    expect(descriptor.skipped_operations).toEqual(['tune']);
    expect(descriptor.operations.has('tune')).toBe(false);
    expect(extractTarget(SERVICE_MANIFEST).skipped_operations).toEqual([]);
  });

  it('does not let the parent resurface when the override is skipped', () => {
    const layer: OperationLayer<FakeService> = {
      layer_id: 'child',
      extends: BASE_LAYER,
      operations: [{ name: 'stop', params: [{ name: 'grace' }], run: () => 'stopped' }],
    };
    const { operations, skipped } = extractOperations(layer);
    expect(operations.has('stop')).toBe(false);
    expect(skipped).toEqual(['stop']);
  });

  it('never exposes constructor names as operations', () => {
    const layer: OperationLayer<FakeService> = {
      layer_id: 'odd',
      operations: [
        { name: 'create', params: [], run: () => 'no' },
        { name: 'constructor', params: [], run: () => 'no' },
      ],
    };
    expect(extractOperations(layer).operations.size).toBe(0);
  });

  it('uses the manifest description as the target description', () => {
    expect(extractTarget(SERVICE_MANIFEST).description).toBe('Manage the fake service');
  });
});
