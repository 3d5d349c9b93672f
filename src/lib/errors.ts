/**
 * Flowform Error Hierarchy
 *
 * Typed error classes for programmatic handling of plan, apply and state
 * failures.
 *
 * Hierarchy:
 *   FlowformError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── ValidationError (desired set problems, nothing mutated)
 *   │   ├── UnknownResourceTypeError
 *   │   ├── DuplicateAddressError
 *   │   ├── UnresolvedReferenceError
 *   │   └── PlanValidationError
 *   ├── DependencyCycleError
 *   ├── StateError (state file problems)
 *   │   ├── StateLockError
 *   │   ├── StateProjectMismatchError
 *   │   └── StateCorruptError
 *   ├── StalePlanError
 *   ├── InvalidPlanError
 *   ├── ApplyError (handler failure mid-apply)
 *   └── ApplyCanceledError
 */

import type { ApplyResult } from '../domain/types.js'

export interface FlowformErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all Flowform errors
 */
export class FlowformError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: FlowformErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'FlowformError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends FlowformError {
  constructor(message: string, code: string, options?: FlowformErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when the configuration file is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath?: string) {
    super(
      searchedPath
        ? `Config file not found: ${searchedPath}`
        : 'No flowform.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create a flowform.yaml or pass the path to the config file',
        context: searchedPath ? { searchedPath } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

export interface ConfigIssue {
  /** Dotted location inside the file, e.g. `datasets[0].name` */
  path: string
  message: string
}

/**
 * Thrown when the configuration has invalid content. Carries every problem
 * found, not only the first.
 */
export class InvalidConfigError extends ConfigError {
  readonly issues: ConfigIssue[]

  constructor(issues: ConfigIssue[], configPath?: string, cause?: unknown) {
    const detail = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
    super(
      configPath ? `Invalid config in ${configPath}: ${detail}` : `Invalid config: ${detail}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the config file against the documented resource fields',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
    this.issues = issues
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends FlowformError {
  constructor(message: string, code: string, options?: FlowformErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

export class UnknownResourceTypeError extends ValidationError {
  readonly resourceType: string

  constructor(resourceType: string, known: string[] = []) {
    super(
      `Unknown resource type: ${resourceType}`,
      'UNKNOWN_RESOURCE_TYPE',
      {
        suggestion: known.length > 0
          ? `Registered types: ${known.join(', ')}`
          : 'Register a handler for this type before planning',
        context: { resourceType }
      }
    )
    this.name = 'UnknownResourceTypeError'
    this.resourceType = resourceType
  }
}

export class DuplicateAddressError extends ValidationError {
  readonly address: string

  constructor(address: string) {
    super(
      `Duplicate resource address: ${address}`,
      'DUPLICATE_ADDRESS',
      {
        suggestion: 'Resource names must be unique per type',
        context: { address }
      }
    )
    this.name = 'DuplicateAddressError'
    this.address = address
  }
}

export class UnresolvedReferenceError extends ValidationError {
  readonly address: string
  readonly reference: string

  constructor(address: string, reference: string) {
    super(
      `Resource ${address} references unknown address ${reference}`,
      'UNRESOLVED_REFERENCE',
      {
        suggestion: `Declare ${reference} or remove the reference`,
        context: { address, reference }
      }
    )
    this.name = 'UnresolvedReferenceError'
    this.address = address
    this.reference = reference
  }
}

/**
 * Aggregated problems reported by the per-type validation hooks
 */
export class PlanValidationError extends ValidationError {
  readonly errors: string[]

  constructor(errors: string[]) {
    super(
      `Validation failed with ${errors.length} error(s):\n${errors.map(e => `  - ${e}`).join('\n')}`,
      'PLAN_VALIDATION_FAILED',
      { context: { errors } }
    )
    this.name = 'PlanValidationError'
    this.errors = errors
  }
}

// =============================================================================
// Graph Errors
// =============================================================================

export class DependencyCycleError extends FlowformError {
  /** Addresses along the cycle; the first address is repeated at the end */
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super(
      `Dependency cycle detected: ${cycle.join(' -> ')}`,
      'DEPENDENCY_CYCLE',
      {
        suggestion: 'Remove one of the depends_on entries or references along the cycle',
        context: { cycle }
      }
    )
    this.name = 'DependencyCycleError'
    this.cycle = cycle
  }
}

// =============================================================================
// State Errors
// =============================================================================

export class StateError extends FlowformError {
  constructor(message: string, code: string, options?: FlowformErrorOptions) {
    super(message, code, options)
    this.name = 'StateError'
  }
}

export class StateLockError extends StateError {
  readonly statePath: string

  constructor(statePath: string, cause?: unknown) {
    super(
      `State is locked by another process: ${statePath}`,
      'STATE_LOCKED',
      {
        suggestion: 'Wait for the other plan or apply to finish, then retry',
        context: { statePath },
        cause
      }
    )
    this.name = 'StateLockError'
    this.statePath = statePath
  }
}

export class StateProjectMismatchError extends StateError {
  readonly expected: string
  readonly actual: string

  constructor(expected: string, actual: string) {
    super(
      `State belongs to project "${actual}", but the configuration targets "${expected}"`,
      'STATE_PROJECT_MISMATCH',
      {
        suggestion: 'Point state_path at the state file of this project',
        context: { expected, actual }
      }
    )
    this.name = 'StateProjectMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

export class StateCorruptError extends StateError {
  constructor(statePath: string, reason: string, cause?: unknown) {
    super(
      `State file ${statePath} is unreadable: ${reason}`,
      'STATE_CORRUPT',
      {
        suggestion: `Restore ${statePath}.backup if it is intact`,
        context: { statePath, reason },
        cause
      }
    )
    this.name = 'StateCorruptError'
  }
}

// =============================================================================
// Plan & Apply Errors
// =============================================================================

export type StaleField = 'lineage' | 'serial' | 'digest'

export class StalePlanError extends FlowformError {
  readonly field: StaleField

  constructor(field: StaleField, expected: string | number, actual: string | number) {
    super(
      `Plan is stale: state ${field} is ${actual}, plan was computed against ${expected}`,
      'STALE_PLAN',
      {
        suggestion: 'Run plan again and apply the new plan',
        context: { field, expected, actual }
      }
    )
    this.name = 'StalePlanError'
    this.field = field
  }
}

export class InvalidPlanError extends FlowformError {
  constructor(planPath: string, reason: string, cause?: unknown) {
    super(
      `Invalid plan file ${planPath}: ${reason}`,
      'INVALID_PLAN',
      {
        suggestion: 'Run plan again to produce a fresh plan file',
        context: { planPath },
        cause
      }
    )
    this.name = 'InvalidPlanError'
  }
}

/**
 * A handler failed mid-apply. State reflects every completed change.
 */
export class ApplyError extends FlowformError {
  readonly result: ApplyResult
  readonly address: string

  constructor(result: ApplyResult, address: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `Apply failed at ${address}: ${reason}`,
      'APPLY_FAILED',
      {
        suggestion: 'Fix the cause, then plan and apply again; completed changes will show as no-op',
        context: { address, completed: result.completed.map(c => c.address) },
        cause
      }
    )
    this.name = 'ApplyError'
    this.result = result
    this.address = address
  }

  override toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.result.completed.length > 0) {
      lines.push(`  Completed (${this.result.completed.length}):`)
      for (const change of this.result.completed) {
        lines.push(`    ${change.action} ${change.address}`)
      }
    } else {
      lines.push('  Completed: none')
    }
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }
}

/**
 * Cancellation observed between changes.
 */
export class ApplyCanceledError extends FlowformError {
  readonly result: ApplyResult

  constructor(result: ApplyResult) {
    super(
      `Apply canceled after ${result.completed.length} change(s)`,
      'APPLY_CANCELED',
      {
        suggestion: 'Plan and apply again to finish the remaining changes',
        context: { completed: result.completed.map(c => c.address) }
      }
    )
    this.name = 'ApplyCanceledError'
    this.result = result
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFlowformError(error: unknown): error is FlowformError {
  return error instanceof FlowformError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError
}

export function isApplyError(error: unknown): error is ApplyError {
  return error instanceof ApplyError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isFlowformError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a FlowformError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): FlowformError {
  if (isFlowformError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new FlowformError(error.message, defaultCode, { cause: error })
  }
  return new FlowformError(String(error), defaultCode)
}
