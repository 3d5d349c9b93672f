/**
 * Flowform - Declarative plan/apply provisioning for data-platform projects
 *
 * Main library exports
 */

export * from './types.js'
export * from './domain/index.js'
export * from './lib/errors.js'
export {
  createLogger,
  setLogHandler,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  maskSecret,
  logger,
  LogLevel
} from './lib/logger.js'
export type { Logger, LogEntry, LogHandler } from './lib/logger.js'
export { canonicalJson, digestOf } from './lib/digest.js'
export {
  StateStore,
  createEmptyState,
  computeStateDigest,
  computeAttributesHash,
  verifyState,
  STATE_VERSION
} from './lib/state-store.js'
export {
  loadConfig,
  decodeConfig,
  findConfigFile,
  configExists,
  expandEnvVars
} from './lib/config-loader.js'
export type { LoadConfigOptions, Env } from './lib/config-loader.js'
export {
  formatChange,
  formatChanges,
  formatPlan,
  formatPlanSummary,
  formatApplySummary,
  formatDriftSummary
} from './lib/output.js'
export type { FormatOptions } from './lib/output.js'
export {
  RESOURCE_DEFINITIONS,
  RESOURCE_SECTIONS,
  getDefinition,
  createResourceRegistry,
  decodeResources
} from './resources/index.js'
export type { ResourceDefinition, FieldSpec, FieldSpecs, ReferenceSpec } from './resources/index.js'
export { MemoryBackend, createMemoryRegistry } from './handlers/memory.js'
export type { BackendAction, BackendCall, MemoryBackendOptions } from './handlers/memory.js'
export * as flowform from './config.js'
