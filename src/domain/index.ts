/**
 * Flowform Domain - Public API
 */

export * from './types.js'
export { DependencyGraph, buildGraph, graphFromState } from './graph.js'
export type { GraphNode } from './graph.js'
export {
  resolvePlaceholders,
  normalizeAttributes,
  deepEqual,
  valuesMatch,
  diffDesired,
  diffSnapshots
} from './compare.js'
export { ResourceTypeRegistry } from './registry.js'
export type { RegisteredType, RegisterOptions } from './registry.js'
export {
  computePlan,
  planDestroy,
  computeConfigDigest,
  summarizePlan,
  hasActionableChanges,
  assertPlanFresh,
  planId,
  writePlanArtifact,
  readPlanArtifact,
  readLatestPlan,
  ENGINE_VERSION,
  PLAN_VERSION
} from './plan.js'
export type { ComputePlanOptions, PlanArtifactPaths } from './plan.js'
export { executePlan, buildDestroyPlan } from './apply.js'
export type { ExecutePlanOptions } from './apply.js'
export { detectDrift } from './drift.js'
export type { DetectDriftOptions, DriftResult } from './drift.js'
export { Engine } from './engine.js'
export type { EngineOptions, PlanOptions, ApplyOptions } from './engine.js'
