/**
 * Flowform Config Loader
 *
 * Loads flowform.yaml, expands environment references, fills provider
 * settings from FLOWFORM_* variables and decodes the resource sections.
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import { decodeResources, RESOURCE_SECTIONS } from '../resources/index.js'
import type { FlowformConfig, ProviderConfig } from '../types.js'
import { CONFIG_FILE_NAMES, DEFAULT_PLANS_DIR, DEFAULT_STATE_PATH } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError } from './errors.js'
import type { ConfigIssue } from './errors.js'
import { logger, maskSecret } from './logger.js'

/** Maximum number of parent directories searched for a config file */
const MAX_SEARCH_DEPTH = 5

const TOP_LEVEL_KEYS: readonly string[] = ['provider', 'state_path', 'plans_dir', ...RESOURCE_SECTIONS]

export type Env = Record<string, string | undefined>

// ============================================================================
// Environment Expansion
// ============================================================================

/**
 * Expand `${VAR}` and `${VAR:-default}` in a string. Only upper-case names
 * are environment references; `${projectKey}` and other engine placeholders
 * pass through.
 */
export function expandEnvVars(str: string, env: Env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([A-Z_][A-Z0-9_]*):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  return str.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })
}

/**
 * Recursively expand env vars in a parsed YAML value
 */
export function expandEnvVarsInObject(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandEnvVarsInObject(item, env))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInObject(item, env)
    }
    return result
  }
  return value
}

/**
 * Values of `.env` beside the config file, overridden by the process
 * environment. `process.env` itself is not modified.
 */
export function loadEnv(configDir: string, baseEnv: Env = process.env): Env {
  const envPath = path.join(configDir, '.env')
  const fileValues = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath)) : {}
  return { ...fileValues, ...baseEnv }
}

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Find the config file by searching up the directory tree
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth <= MAX_SEARCH_DEPTH; depth++) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(currentDir, name)
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate
      }
    }
    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) break
    currentDir = parentDir
  }

  return null
}

export function configExists(startDir?: string): boolean {
  return findConfigFile(startDir) !== null
}

function resolveConfigPath(target: string | undefined): string {
  if (target === undefined) {
    const found = findConfigFile()
    if (!found) throw new ConfigNotFoundError()
    return found
  }

  const resolved = path.resolve(target)
  if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    const found = CONFIG_FILE_NAMES.map(name => path.join(resolved, name)).find(p => fs.existsSync(p))
    if (!found) throw new ConfigNotFoundError(path.join(resolved, CONFIG_FILE_NAMES[0]))
    return found
  }
  if (!fs.existsSync(resolved)) {
    throw new ConfigNotFoundError(resolved)
  }
  return resolved
}

// ============================================================================
// Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(
  source: Record<string, unknown>,
  key: string,
  at: string,
  issues: ConfigIssue[]
): string | undefined {
  const value = source[key]
  if (value === undefined || value === null || value === '') return undefined
  if (typeof value !== 'string') {
    issues.push({ path: `${at}.${key}`, message: 'must be a string' })
    return undefined
  }
  return value
}

function decodeProvider(raw: unknown, env: Env, issues: ConfigIssue[]): ProviderConfig {
  const source: Record<string, unknown> = {}
  if (raw !== undefined && raw !== null) {
    if (!isRecord(raw)) {
      issues.push({ path: 'provider', message: 'must be a mapping' })
    } else {
      for (const key of Object.keys(raw)) {
        if (!['project', 'host', 'api_key'].includes(key)) {
          issues.push({ path: `provider.${key}`, message: 'unknown field' })
        }
      }
      Object.assign(source, raw)
    }
  }

  const project = optionalString(source, 'project', 'provider', issues) || env.FLOWFORM_PROJECT
  const host = optionalString(source, 'host', 'provider', issues) || env.FLOWFORM_HOST
  const apiKey = optionalString(source, 'api_key', 'provider', issues) || env.FLOWFORM_API_KEY

  if (!project) {
    issues.push({ path: 'provider.project', message: 'is required (or set FLOWFORM_PROJECT)' })
  }

  return {
    project: project ?? '',
    ...(host ? { host } : {}),
    ...(apiKey ? { apiKey } : {})
  }
}

export interface LoadConfigOptions {
  /** Environment used for expansion and provider fallbacks (default process.env) */
  env?: Env
}

/**
 * Parse and decode a configuration document. `configDir` anchors relative
 * paths. Every problem found is reported in one InvalidConfigError.
 */
export function decodeConfig(
  document: unknown,
  configPath: string,
  options: LoadConfigOptions = {}
): FlowformConfig {
  const configDir = path.dirname(configPath)
  const env = loadEnv(configDir, options.env)
  const issues: ConfigIssue[] = []

  const expanded = expandEnvVarsInObject(document ?? {}, env)
  if (!isRecord(expanded)) {
    throw new InvalidConfigError([{ path: '', message: 'top level must be a mapping' }], configPath)
  }

  for (const key of Object.keys(expanded)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      issues.push({ path: key, message: 'unknown section' })
    }
  }

  const provider = decodeProvider(expanded.provider, env, issues)
  const statePath = optionalString(expanded, 'state_path', 'config', issues) ?? DEFAULT_STATE_PATH
  const plansDir = optionalString(expanded, 'plans_dir', 'config', issues) ?? DEFAULT_PLANS_DIR
  const resources = decodeResources(expanded, issues, { configDir })

  if (issues.length > 0) {
    throw new InvalidConfigError(issues, configPath)
  }

  logger.debug('Loaded config', {
    configPath,
    project: provider.project,
    host: provider.host,
    apiKey: provider.apiKey ? maskSecret(provider.apiKey) : undefined,
    resources: resources.length
  })

  return {
    provider,
    statePath: path.resolve(configDir, statePath),
    plansDir: path.resolve(configDir, plansDir),
    configDir,
    configPath,
    resources
  }
}

/**
 * Load a configuration file. `target` may be the file, its directory, or
 * omitted to search upward from the working directory.
 */
export function loadConfig(target?: string, options: LoadConfigOptions = {}): FlowformConfig {
  const configPath = resolveConfigPath(target)

  let document: unknown
  try {
    document = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new InvalidConfigError([{ path: '', message: `YAML parse error: ${message}` }], configPath, err)
  }

  return decodeConfig(document, configPath, options)
}
