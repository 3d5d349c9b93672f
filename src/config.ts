/**
 * Flowform - Programmatic API
 *
 * One-call helpers over a loaded configuration:
 *
 *   const config = load('./flowform.yaml')
 *   const plan = await plan(config, { registry })
 *   await apply(config, plan, { registry })
 *
 * Handlers are supplied by the caller through `registry`.
 */

import { Engine } from './domain/engine.js'
import type { ApplyOptions, PlanOptions } from './domain/engine.js'
import type { DriftResult } from './domain/drift.js'
import { readLatestPlan, readPlanArtifact, writePlanArtifact } from './domain/plan.js'
import type { PlanArtifactPaths } from './domain/plan.js'
import type { ResourceTypeRegistry } from './domain/registry.js'
import type { ApplyResult, Plan, ResourceChange, State } from './domain/types.js'
import { loadConfig } from './lib/config-loader.js'
import type { LoadConfigOptions } from './lib/config-loader.js'
import type { Logger } from './lib/logger.js'
import type { FlowformConfig } from './types.js'

export interface EngineSetup {
  registry: ResourceTypeRegistry
  /** Extra placeholder values for attribute normalization */
  variables?: Record<string, string>
  logger?: Logger
}

/**
 * Load a YAML configuration file (or search upward for one).
 */
export function load(target?: string, options?: LoadConfigOptions): FlowformConfig {
  return loadConfig(target, options)
}

export function createEngine(config: FlowformConfig, setup: EngineSetup): Engine {
  return new Engine({
    project: config.provider.project,
    statePath: config.statePath,
    registry: setup.registry,
    variables: setup.variables,
    logger: setup.logger
  })
}

/**
 * Plan changes for the configuration
 */
export function plan(config: FlowformConfig, options: EngineSetup & PlanOptions): Promise<Plan> {
  return createEngine(config, options).plan(config.resources, options)
}

/**
 * Apply a previously computed plan
 */
export function apply(config: FlowformConfig, plan: Plan, options: EngineSetup & ApplyOptions): Promise<ApplyResult> {
  return createEngine(config, options).apply(plan, options)
}

/**
 * Plan and apply in one step
 */
export async function planAndApply(
  config: FlowformConfig,
  options: EngineSetup & PlanOptions & ApplyOptions
): Promise<{ plan: Plan; result: ApplyResult }> {
  const engine = createEngine(config, options)
  const computed = await engine.plan(config.resources, options)
  const result = await engine.apply(computed, options)
  return { plan: computed, result }
}

/**
 * Delete every resource tracked in state
 */
export function destroy(config: FlowformConfig, options: EngineSetup & ApplyOptions): Promise<ApplyResult> {
  return createEngine(config, options).destroy(options)
}

/**
 * Read live attributes for tracked resources. Nothing is persisted; pass the
 * returned state to saveState() to keep it.
 */
export function refresh(config: FlowformConfig, options: EngineSetup): Promise<DriftResult> {
  return createEngine(config, options).drift()
}

/**
 * Drift between the state file and the live system
 */
export async function drift(config: FlowformConfig, options: EngineSetup): Promise<ResourceChange[]> {
  const result = await createEngine(config, options).drift()
  return result.changes
}

/**
 * Persist a state obtained from refresh()
 */
export function saveState(config: FlowformConfig, state: State, options: EngineSetup): Promise<State> {
  return createEngine(config, options).saveState(state)
}

/**
 * Save a plan under the configured plans directory
 */
export function savePlan(config: FlowformConfig, plan: Plan): PlanArtifactPaths {
  return writePlanArtifact(plan, config.plansDir)
}

export function loadPlan(planPath: string): Plan {
  return readPlanArtifact(planPath)
}

export function latestPlan(config: FlowformConfig): Plan | null {
  return readLatestPlan(config.provider.project, config.plansDir)
}
