/**
 * @surrogate/core - Error system, logging, configuration and RPC plumbing
 * shared by the proxy engine.
 */

// Branding utilities
export type { SoftBrand, Id } from "./brand.js";

// Error system (SurrogateError and ErrFacet are both type and value)
export { SurrogateError, ErrFacet } from "./surrogate-error.js";
export type {
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  InferPropsData,
  FacetProps,
  MergeFacetProps,
  ErrorDef,
  ErrorBoundary,
  SurrogateErrorJSON,
  SerializedError,
} from "./surrogate-error.js";

// Standard facets
export * from "./errors/errors.js";

// Type system utilities
export type { UnionToIntersection, Simplify, NullaryConstructor } from "./type-system-utils.js";

// Inspect
export { Inspect, inspect } from "./inspect.js";
export type { InspectFormat } from "./inspect.js";

// Logging
export { ConsoleLogger, createLogger, formatMessage, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel, LogContext, LogSink } from "./logger.js";

// Configuration
export { SurrogateConfig } from "./config.js";
export type { SurrogateEnv } from "./config.js";

// Federation — RPC envelope and transports
export * from "./federation/index.js";

// Utilities
export { StaticTypeCompanion } from "./companion.js";
