/**
 * @rigging/kernel
 *
 * Grammar derivation, dispatch, and configuration mutation: descriptor
 * extractor, flag mapper, interface assembler, execution dispatcher, and
 * mutation engine.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for grammar fingerprints (pure computation, not I/O).
 *
 * Change log persistence, state storage and the command-line projection live
 * in @rigging/runtime-host and @rigging/cli.
 */

// Types
export type {
  BooleanType,
  ListType,
  OptionalType,
  ParamValue,
  RequiredType,
  ScalarKind,
  ScalarType,
  ScalarValue,
  SemanticType,
  ValueBag,
} from './types/semantic.js';
export {
  ParamType,
  formatType,
  isEmptyValue,
  isListValue,
  isSemanticType,
  unwrapOptional,
  valueMatchesType,
} from './types/semantic.js';

export type {
  OperationLayer,
  OperationManifest,
  ParameterManifest,
  TargetManifest,
} from './types/manifest.js';

export type {
  OperationDescriptor,
  ParameterDescriptor,
  ResolvedOperation,
  TargetDescriptor,
} from './types/descriptor.js';
export { RESERVED_NAMES } from './types/descriptor.js';

export type {
  ActionSpec,
  FlagSpec,
  FlagValueType,
  Grammar,
  GrammarHash,
  Multiplicity,
} from './types/flag.js';

export type {
  Analyzer,
  AnalyzerCollection,
  AnalyzerState,
  ChangeEntry,
  ChangeSet,
  ConfigField,
  MutationOutcome,
  Report,
  ReportCell,
  TargetConfigObject,
} from './types/change.js';
export { NOT_AVAILABLE } from './types/change.js';

// Errors and validation results
export {
  InvalidManifestError,
  MissingTypeAnnotationError,
  RiggingError,
  UnknownOperationError,
  UsageError,
} from './errors.js';
export type { RiggingErrorCode } from './errors.js';
export type { ValidationError, ValidationResult } from './validation.js';

// Extraction
export {
  extractConstructor,
  extractOperations,
  extractParameter,
  extractTarget,
} from './extraction/extractor.js';

// Mapping
export {
  coerceValue,
  describeFlagSpec,
  fromActionToken,
  mapParameter,
  toActionToken,
  toFlagName,
} from './mapping/flag-mapper.js';
export type { MapOptions } from './mapping/flag-mapper.js';

// Assembly
export { mergeFlagSpecs } from './assembly/merge.js';
export type { MergeResult } from './assembly/merge.js';
export { canonicalize, hashGrammar } from './assembly/hash.js';
export {
  MultipleResponsibilityInterface,
  SingleResponsibilityInterface,
} from './assembly/interfaces.js';
export type {
  InterfaceDefaults,
  InterfaceKind,
  InterfaceOptions,
  ManagerInterface,
  MultipleResponsibilityOptions,
  SingleResponsibilityOptions,
} from './assembly/interfaces.js';

// Dispatch
export { dispatch, normalizeValues, partitionValues } from './dispatch/dispatcher.js';
export type { DispatchOptions, PartitionedValues } from './dispatch/dispatcher.js';

// Mutation
export { toOptionLabel } from './mutation/config-interface.js';
export type { ConfigInterface, ConfigInterfaceOptions } from './mutation/config-interface.js';
export {
  ANALYZER_REPORT_HEADERS,
  AnalyzersInterface,
  canonicalizeAnalyzerValue,
} from './mutation/analyzers.js';
export { TARGET_REPORT_HEADERS, TargetConfigInterface } from './mutation/target-config.js';
export type { TargetConfigInterfaceOptions } from './mutation/target-config.js';
export { RecordConfigObject } from './mutation/record-config.js';
export type { ConfigValues } from './mutation/record-config.js';

// Change logging (sink implementations live in runtime-host)
export { ChangeLogger } from './logging/change-logger.js';
export type { ChangeRecord, ChangeSink } from './logging/change-sink.js';
