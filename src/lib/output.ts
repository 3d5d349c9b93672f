/**
 * Flowform Output Formatting
 *
 * Plain-text rendering of plans, apply results and drift reports.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import type { ApplyResult, ChangeSummary, Plan, ResourceChange, AttributeValue } from '../domain/types.js'
import { summarizeChanges } from '../domain/types.js'

export interface FormatOptions {
  /** Defaults to the terminal's color support */
  color?: boolean
}

// Check if colors should be enabled
export const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const ansi = {
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  reset: '\x1b[0m'
} as const

type Tone = Exclude<keyof typeof ansi, 'reset'>

function paint(text: string, tone: Tone, options: FormatOptions): string {
  const enabled = options.color ?? isColorEnabled()
  return enabled ? `${ansi[tone]}${text}${ansi.reset}` : text
}

function formatValue(value: AttributeValue | undefined): string {
  return value === undefined ? '(absent)' : JSON.stringify(value)
}

// ============================================================================
// Changes
// ============================================================================

/**
 * One change, Terraform style. Updates list their changed fields.
 * Returns an empty string for no-op changes.
 */
export function formatChange(change: ResourceChange, options: FormatOptions = {}): string {
  switch (change.action) {
    case 'create':
      return paint(`+ ${change.address}`, 'green', options)
    case 'delete':
      return paint(`- ${change.address}`, 'red', options)
    case 'update': {
      const lines = [paint(`~ ${change.address}`, 'yellow', options)]
      for (const [field, diff] of Object.entries(change.diff ?? {})) {
        lines.push(`    ${field}: ${formatValue(diff.from)} => ${formatValue(diff.to)}`)
      }
      return lines.join('\n')
    }
    default:
      return ''
  }
}

export function formatChanges(changes: ResourceChange[], options: FormatOptions = {}): string {
  return changes
    .filter(change => change.action !== 'no-op')
    .map(change => formatChange(change, options))
    .join('\n')
}

// ============================================================================
// Summaries
// ============================================================================

export function formatPlanSummary(summary: ChangeSummary): string {
  return `Plan: ${summary.create} to add, ${summary.update} to change, ${summary.delete} to destroy.`
}

export function formatPlan(plan: Plan, options: FormatOptions = {}): string {
  const summary = summarizeChanges(plan.changes)
  if (summary.create + summary.update + summary.delete === 0) {
    return 'No changes. Infrastructure is up-to-date.'
  }
  return `${formatChanges(plan.changes, options)}\n\n${paint(formatPlanSummary(summary), 'bold', options)}`
}

export function formatApplySummary(result: ApplyResult, options: FormatOptions = {}): string {
  const done = summarizeChanges(result.completed)
  const counts = `Resources: ${done.create} added, ${done.update} changed, ${done.delete} destroyed.`

  if (result.failedAddress) {
    return paint(`Apply failed at ${result.failedAddress}: ${result.error ?? 'unknown error'}`, 'red', options) +
      `\n${counts}`
  }
  if (result.canceled) {
    return paint('Apply canceled.', 'yellow', options) + ` ${counts}`
  }
  return paint('Apply complete!', 'green', options) + ` ${counts}`
}

export function formatDriftSummary(changes: ResourceChange[], options: FormatOptions = {}): string {
  if (changes.length === 0) {
    return 'No drift detected.'
  }
  const summary = summarizeChanges(changes)
  return `${formatChanges(changes, options)}\n\n` +
    paint(`Drift: ${summary.update} changed, ${summary.delete} deleted outside of flowform.`, 'bold', options)
}
