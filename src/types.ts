/**
 * Flowform - Type Definitions
 */

import type { Resource } from './domain/types.js'

// ============================================================================
// Configuration Types
// ============================================================================

/** Default configuration file name */
export const DEFAULT_CONFIG_FILE = 'flowform.yaml'

/** Alternative configuration file names, searched after the default */
export const CONFIG_FILE_NAMES: readonly string[] = [DEFAULT_CONFIG_FILE, 'flowform.yml']

/** Default state file, relative to the configuration directory */
export const DEFAULT_STATE_PATH = '.flowform-state.json'

/** Default directory for saved plans, relative to the configuration directory */
export const DEFAULT_PLANS_DIR = '.flowform/plans'

/**
 * Connection settings of the target project. Each field falls back to a
 * FLOWFORM_* environment variable.
 */
export interface ProviderConfig {
  /** Target project key (FLOWFORM_PROJECT) */
  project: string
  /** Remote system URL (FLOWFORM_HOST) */
  host?: string
  /** API key (FLOWFORM_API_KEY); keep it out of the YAML file */
  apiKey?: string
}

export interface FlowformConfig {
  provider: ProviderConfig
  /** Absolute path of the state file */
  statePath: string
  /** Absolute path of the saved plans directory */
  plansDir: string
  /** Directory holding the configuration file */
  configDir: string
  configPath: string
  /** Every declared resource; order is the declaration order */
  resources: Resource[]
}
