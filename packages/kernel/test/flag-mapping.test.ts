/**
 * Rigging Kernel — Flag Mapping Tests
 *
 * map/precedence: boolean → toggle, list → one-or-more, optional or
 *   defaulted → not required, otherwise required.
 * map/override: non-empty external defaults win and make the flag optional.
 * map/coerce: raw argument text is coerced to the flag's value type.
 */

import { describe, it, expect } from 'vitest';
import {
  coerceValue,
  describeFlagSpec,
  mapParameter,
  ParamType,
  toFlagName,
  UsageError,
} from '../src/index.js';
import type { ParameterDescriptor, ParamValue, SemanticType } from '../src/index.js';

function param(name: string, semantic_type: SemanticType, extra: Partial<ParameterDescriptor> = {}): ParameterDescriptor {
  return { name, semantic_type, description: '', is_reserved: false, ...extra };
}

// ---------------------------------------------------------------------------
// map/precedence
// ---------------------------------------------------------------------------

describe('map/precedence', () => {
  it('derives the primary switch from the parameter name', () => {
    expect(toFlagName('node_name')).toBe('--node-name');
    expect(toFlagName('port')).toBe('--port');
  });

  it('maps a boolean to a zero-argument toggle', () => {
    expect(mapParameter(param('verbose', ParamType.Boolean))).toEqual({
      dest: 'verbose',
      flags: ['--verbose'],
      required: false,
      value_type: 'none',
      multiplicity: 'single',
      help_text: '',
    });
  });

  it('maps optional<boolean> to a toggle as well', () => {
    const spec = mapParameter(param('stdout', ParamType.optional(ParamType.Boolean)));
    expect(spec.value_type).toBe('none');
    expect(spec.required).toBe(false);
  });

  it('maps list<integer> to a required one-or-more int flag', () => {
    const spec = mapParameter(param('ids', ParamType.list(ParamType.Integer)));
    expect(spec.value_type).toBe('int');
    expect(spec.multiplicity).toBe('many');
    expect(spec.required).toBe(true);
  });

  it('maps optional<list<string>> to an optional one-or-more string flag', () => {
    const spec = mapParameter(param('interfaces', ParamType.optional(ParamType.list(ParamType.String))));
    expect(spec.value_type).toBe('string');
    expect(spec.multiplicity).toBe('many');
    expect(spec.required).toBe(false);
  });

  it('maps optional<float> to an optional single float flag', () => {
    const spec = mapParameter(param('timeout', ParamType.optional(ParamType.Float)));
    expect(spec).toMatchObject({ value_type: 'float', multiplicity: 'single', required: false });
  });

  it('treats a non-empty extraction-time default as optional', () => {
    const spec = mapParameter(param('interface', ParamType.String, { default: 'eth0' }));
    expect(spec.required).toBe(false);
    expect(spec.default).toBe('eth0');
  });

  it('requires a plain scalar without a default', () => {
    const spec = mapParameter(param('port', ParamType.Integer));
    expect(spec).toMatchObject({ required: true, value_type: 'int', multiplicity: 'single' });
    expect(spec.default).toBeUndefined();
  });

  it('is deterministic', () => {
    const descriptor = param('threads', ParamType.Integer, { description: 'Worker threads' });
    expect(mapParameter(descriptor)).toEqual(mapParameter(descriptor));
  });
});

// ---------------------------------------------------------------------------
// map/override
// ---------------------------------------------------------------------------

describe('map/override', () => {
  it('replaces the default and forces required = false', () => {
    const spec = mapParameter(param('install_directory', ParamType.String), { override: '/opt/rigging/sensor' });
    expect(spec.required).toBe(false);
    expect(spec.default).toBe('/opt/rigging/sensor');
  });

  const emptyOverrides: ReadonlyArray<{ label: string; value: ParamValue | undefined }> = [
    { label: 'undefined', value: undefined },
    { label: 'empty string', value: '' },
    { label: 'false', value: false },
    { label: 'zero', value: 0 },
    { label: 'empty list', value: [] },
  ];

  it.each(emptyOverrides)('ignores an empty override ($label)', ({ value }) => {
    const spec = mapParameter(param('port', ParamType.Integer), { override: value });
    expect(spec.required).toBe(true);
    expect(spec.default).toBeUndefined();
  });

  it('prefers explicit help text over the description', () => {
    const descriptor = param('port', ParamType.Integer, { description: 'From the manifest' });
    expect(mapParameter(descriptor, { helpText: 'Explicit help' }).help_text).toBe('Explicit help');
    expect(mapParameter(descriptor).help_text).toBe('From the manifest');
  });

  it('collapses newlines in help text', () => {
    const descriptor = param('port', ParamType.Integer, { description: 'The port\n    to listen on' });
    expect(mapParameter(descriptor).help_text).toBe('The port to listen on');
  });
});

// ---------------------------------------------------------------------------
// map/describe
// ---------------------------------------------------------------------------

describe('map/describe', () => {
  it('renders a stable JSON line', () => {
    const spec = mapParameter(
      param('port', ParamType.optional(ParamType.Integer), { default: 5044, description: 'Listen port' }),
    );
    expect(describeFlagSpec(spec)).toBe(
      '{"dest":"port","flags":["--port"],"required":false,"value_type":"int","multiplicity":"single","help_text":"Listen port","default":5044}',
    );
  });

  it('omits empty help text and absent defaults', () => {
    expect(describeFlagSpec(mapParameter(param('verbose', ParamType.Boolean)))).toBe(
      '{"dest":"verbose","flags":["--verbose"],"required":false,"value_type":"none","multiplicity":"single"}',
    );
  });
});

// ---------------------------------------------------------------------------
// map/coerce
// ---------------------------------------------------------------------------

describe('map/coerce', () => {
  const intSpec = mapParameter(param('port', ParamType.Integer));
  const floatSpec = mapParameter(param('timeout', ParamType.Float));
  const stringSpec = mapParameter(param('host', ParamType.String));

  it('coerces integers', () => {
    expect(coerceValue(intSpec, '5044')).toBe(5044);
    expect(coerceValue(intSpec, '-3')).toBe(-3);
  });

  it('rejects non-integer text for int flags', () => {
    expect(() => coerceValue(intSpec, '4.5')).toThrow(UsageError);
    expect(() => coerceValue(intSpec, 'abc')).toThrow("--port: invalid int value: 'abc'");
  });

  it('rejects integers beyond the safe range', () => {
    expect(coerceValue(intSpec, '9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => coerceValue(intSpec, '9007199254740993')).toThrow(
      "--port: invalid int value: '9007199254740993'",
    );
    expect(() => coerceValue(intSpec, '-9007199254740993')).toThrow(UsageError);
  });

  it('coerces floats', () => {
    expect(coerceValue(floatSpec, '0.25')).toBe(0.25);
    expect(coerceValue(floatSpec, '3')).toBe(3);
    expect(() => coerceValue(floatSpec, 'soon')).toThrow("--timeout: invalid float value: 'soon'");
  });

  it('passes strings through', () => {
    expect(coerceValue(stringSpec, ' 10.0.0.5 ')).toBe(' 10.0.0.5 ');
  });
});
