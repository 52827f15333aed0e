// @schemock/core entry point
//
// Public API:
// - MockDataGenerator: the coordinator (fingerprint, cache, dispatch).
// - createSchema/assertSchema: the only way Schema values come into being.
// - parseSpecDocument/loadSpecFile/selectResponse: Swagger 2.0 and OpenAPI 3.x
//   input boundary.
// - Strategies, registries and helpers for callers adding custom kinds or formats.

// Coordinator
export {
  MockDataGenerator,
  type MockDataGeneratorOptions,
  type GeneratorStats,
} from './generator/mock-data-generator.js';
export { createGenerationContext, dispatch } from './generator/dispatch.js';
export {
  DataGenerator,
  type GenerationContext,
  type GenerationResult,
  type GeneratorStrategy,
} from './generator/data-generator.js';

// Strategies
export { StringGenerator } from './generator/types/string-generator.js';
export {
  NumberGenerator,
  DEFAULT_NUMBER_RANGES,
  type NumberRange,
  type NumberRanges,
} from './generator/types/number-generator.js';
export {
  BooleanGenerator,
  NullGenerator,
} from './generator/types/boolean-generator.js';
export {
  ArrayGenerator,
  MAX_UNIQUE_ATTEMPTS,
  uniqueDomainSize,
} from './generator/types/array-generator.js';
export {
  ObjectGenerator,
  OPTIONAL_PROPERTY_PROBABILITY,
} from './generator/types/object-generator.js';
export {
  StrategyRegistry,
  createDefaultStrategies,
} from './registry/strategy-registry.js';

// Formats
export {
  FormatRegistry,
  type FormatGenerator,
} from './registry/format-registry.js';
export {
  builtInFormats,
  createDefaultFormatRegistry,
} from './generator/formats/index.js';
export {
  synthesizePattern,
  parsePattern,
  type PatternNode,
  type SynthesisFailure,
  type SynthesisOptions,
} from './regex/pattern-synthesizer.js';

// Schema model
export * from './types/schema.js';
export {
  createSchema,
  assertSchema,
  type CreateSchemaOptions,
  type RefResolver,
} from './schema/create-schema.js';

// Specification documents
export {
  parseSpecDocument,
  HTTP_METHODS,
  type HttpMethod,
  type ParsedOperation,
  type ParsedParameter,
  type ParsedResponse,
  type ParsedSpec,
  type ParseSpecOptions,
  type SpecFormat,
} from './parser/spec-parser.js';
export {
  loadSpecFile,
  readDocument,
  parseDocumentText,
} from './parser/load-spec.js';
export {
  selectOperation,
  selectResponse,
  type ResponseSelection,
  type ResponseSelector,
} from './openapi/driver.js';

// Configuration
export {
  resolveMockConfig,
  DEFAULT_MOCK_CONFIG,
  CACHE_TTL_MIN,
  CACHE_TTL_MAX,
  type MockConfig,
} from './types/options.js';

// Results and errors
export * from './types/result.js';
export * from './types/errors.js';
export {
  ErrorCode,
  type Severity,
  getExitCode,
} from './errors/codes.js';

// Utilities
export {
  GenerationCache,
  type CacheStats,
  type Clock,
  type GenerationCacheOptions,
} from './util/cache.js';
export {
  createLogger,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './util/logger.js';
export { Rng, fnv1a32 } from './util/rng.js';
export { canonicalJSON } from './util/canonical-json.js';
export { structuralHash, structurallyEqual } from './util/struct-hash.js';
