// Core data models
export type {
  BackendName,
  LogLevel,
  ApproximationTable,
  ApproximationMapping,
  Utf8Backend,
  NormalizeOptions,
  DebugConfig,
  SlugwrightConfig,
} from './types.js';

export {
  CodepointSchema,
  ApproximationKeySchema,
  ApproximationMappingSchema,
  ApproximationFileSchema,
  StrippableFileSchema,
  CaseLocaleSchema,
  isLocaleTag,
  BackendNameSchema,
  LogLevelSchema,
  SlugwrightConfigSchema,
  type ApproximationFile,
  type StrippableFile,
  type RawSlugwrightConfig,
} from './schemas.js';

export { InvalidBoundError, InvalidApproximationError, ConfigError } from './errors.js';
