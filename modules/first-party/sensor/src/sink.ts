/**
 * Rigging First-Party Sensor Module — Event Sink
 *
 * Where the sensor sends the events it produces. The sink is a target
 * configuration object over a fixed field list.
 */

import { ParamType, RecordConfigObject } from '@rigging/kernel';
import type { ConfigField, ConfigValues } from '@rigging/kernel';
import type { ConfigObjectStore } from '@rigging/target-loader';

export const SINK_FILE = 'sensor-sink.json';

export const EVENT_SINK_FIELDS: ReadonlyArray<ConfigField> = [
  {
    name: 'target_strings',
    type: ParamType.list(ParamType.String),
    description: 'One or more host:port pairs events are sent to',
  },
  { name: 'index', type: ParamType.String, description: 'The index events are written to' },
  { name: 'max_batch_size', type: ParamType.Integer, description: 'Maximum events per request' },
  { name: 'timeout', type: ParamType.Float, description: 'Seconds to wait for a response' },
];

export const EVENT_SINK_DEFAULTS: ConfigValues = {
  index: 'sensor-events',
  max_batch_size: 2048,
  timeout: 90,
};

export function loadEventSink(store: ConfigObjectStore): RecordConfigObject {
  return store.loadTarget(SINK_FILE, EVENT_SINK_FIELDS, EVENT_SINK_DEFAULTS);
}

export function saveEventSink(store: ConfigObjectStore, sink: RecordConfigObject): void {
  store.saveTarget(SINK_FILE, sink);
}
