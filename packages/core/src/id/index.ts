/**
 * Identifier System
 *
 * Sortable identifiers built from a 48-bit millisecond timestamp and a
 * randomness field filled by a pluggable strategy, plus a codec for their
 * byte, integer and text forms and a progression engine over packed values.
 */

// Formats
export {
  TIMESTAMP_BITS,
  MAX_TIMESTAMP_MS,
  MIN_TIMESTAMP_MS,
  ULID,
  SHORT_ULID,
  SLID,
  FORMATS,
  type FormatName,
  type TextEncoding,
  type RandomnessLayout,
  type IdentifierFormat,
} from './formats.js';

// Text encodings
export {
  CROCKFORD_ALPHABET,
  HEX_ALPHABET,
  encodeCrockford,
  decodeCrockford,
  encodeHex,
  decodeHex,
} from './text.js';

// Identifier
export { Identifier, maxUnsigned } from './identifier.js';

// Codec
export {
  toBytes,
  fromBytes,
  toInt,
  fromInt,
  toString,
  fromString,
  toHex,
  toOct,
  toBin,
  fromHex,
  fromOct,
  fromBin,
  toRepr,
  fromRepr,
  fromInterfaces,
  toInterfaces,
  toDate,
  toSeconds,
  fromDate,
  fromSeconds,
  minIdentifier,
  maxIdentifier,
  MIN_ULID,
  MAX_ULID,
  MIN_SLID,
  MAX_SLID,
  primeFromTypeOf,
  compare,
  equals,
  type Representation,
  type Comparable,
} from './codec.js';

// Progression
export {
  forward,
  backward,
  next,
  previous,
  sequence,
  IdentifierSequence,
} from './progression.js';

// Time and entropy
export {
  checkTimestamp,
  systemTimeSource,
  cryptoEntropySource,
  FixedTimeSource,
  SequenceEntropySource,
  type TimeSource,
  type EntropySource,
} from './sources.js';

// Counters
export {
  CounterState,
  MemoryCounterStore,
  PersistedCounter,
  withPersistedCounter,
  type CounterStore,
  type PersistedCounterOptions,
} from './counter.js';

// Seeds
export { SeedRegistry, workerThreadHandle, type ThreadHandleProvider } from './seeds.js';

// Strategies
export {
  STRATEGY_NAMES,
  isStrategyName,
  ProcessScope,
  randomStrategy,
  runtimeLexicalStrategy,
  localLexicalStrategy,
  envLexicalStrategy,
  threadEnvLexicalStrategy,
  shortEnvLexicalStrategy,
  slidStrategy,
  type StrategyName,
  type RandomnessStrategy,
  type CounterWrapListener,
  type ProcessScopeOptions,
} from './strategies.js';

// Integrity
export {
  COUNTER_WIDTHS,
  EARLIEST_PLAUSIBLE_MS,
  defaultIntegrityChecks,
  runIntegrityChecks,
  IntegrityGate,
  defaultIntegrityGate,
  type IntegrityCheck,
  type IntegrityCheckResult,
  type IntegrityReport,
  type IntegrityContext,
  type IntegrityChecksFactory,
} from './integrity.js';

// Generation
export {
  DEFAULT_LOCAL_COUNTER,
  DEFAULT_STRATEGY,
  getProcessScope,
  IdentifierGenerator,
  createGenerator,
  withGenerator,
  type GeneratorOptions,
} from './generator.js';

// Metrics and logging
export {
  ID_LOG_LEVELS,
  isIdLogLevel,
  silentLogger,
  ConsoleIdLogger,
  DefaultIdMetricsCollector,
  type IdLogLevel,
  type IdLogger,
  type IdMetricsEventType,
  type IdMetricsEvent,
  type IdMetricsSnapshot,
  type IdMetricsCollector,
} from './telemetry.js';
