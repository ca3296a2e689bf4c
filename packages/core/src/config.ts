import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_TIMEZONE, resolveTimezone } from './calendar/parser.js'
import { ConfigError, errorMessage } from './errors.js'
import { DEFAULT_REQUEST_TIMEOUT_MS } from './store/http.js'
import { DEFAULT_OBJECT_STORE_URL } from './store/object-store-client.js'
import { DEFAULT_GRAPH_LAYER_URL } from './store/graph-client.js'

export const CONFIG_DIRNAME = '.calendar-graph'
const CONFIG_FILENAME = 'config.yaml'

export interface CalendarGraphConfig {
  objectStoreUrl: string
  /** Sent as X-API-Token; empty = none */
  objectStoreToken: string
  graphLayerUrl: string
  /** Bearer token for the graph layer; empty = none */
  graphToken: string
  timezone: string
  importConcurrency: number
  requestTimeoutMs: number
}

export const DEFAULT_CONFIG: CalendarGraphConfig = {
  objectStoreUrl: DEFAULT_OBJECT_STORE_URL,
  objectStoreToken: '',
  graphLayerUrl: DEFAULT_GRAPH_LAYER_URL,
  graphToken: '',
  timezone: DEFAULT_TIMEZONE,
  importConcurrency: 1,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
}

const ServiceSchema = z
  .object({
    url: z.string().optional(),
    token: z.string().optional(),
  })
  .optional()

const YamlConfigSchema = z
  .object({
    objectstore: ServiceSchema,
    graphlayer: ServiceSchema,
    timezone: z.string().optional(),
    import: z
      .object({
        concurrency: z.number().optional(),
      })
      .optional(),
    request: z
      .object({
        timeoutMs: z.number().optional(),
        timeout_ms: z.number().optional(),
      })
      .optional(),
  })
  .nullable()

type YamlConfig = NonNullable<z.infer<typeof YamlConfigSchema>>

export function findConfigDir(cwd = process.cwd()): string {
  // Walk up from cwd looking for an existing .calendar-graph/ directory
  let dir = cwd
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.resolve(cwd, CONFIG_DIRNAME)
}

function loadYamlConfig(configDir: string): YamlConfig | null {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }
  try {
    const raw = readFileSync(configPath, 'utf-8')
    const result = YamlConfigSchema.safeParse(parse(raw))
    if (!result.success) {
      const issue = result.error.issues[0]
      throw new Error(issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid structure')
    }
    return result.data
  } catch (err) {
    console.warn(`[Config] Could not parse ${configPath}: ${errorMessage(err)}. Using defaults.`)
    return null
  }
}

export interface LoadConfigOptions {
  /** Directory holding config.yaml (default: CALENDAR_GRAPH_DIR, then a walk up from cwd) */
  configDir?: string
  env?: NodeJS.ProcessEnv
  /** Highest precedence, e.g. CLI flags */
  overrides?: Partial<CalendarGraphConfig>
}

/**
 * Defaults ← config.yaml ← environment ← overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): CalendarGraphConfig {
  const env = options.env ?? process.env
  const configDir = options.configDir ?? env.CALENDAR_GRAPH_DIR ?? findConfigDir()
  const yaml = loadYamlConfig(configDir)
  const overrides = options.overrides ?? {}

  const config: CalendarGraphConfig = {
    objectStoreUrl:
      overrides.objectStoreUrl ??
      env.CALENDAR_GRAPH_OBJECTSTORE_URL ??
      yaml?.objectstore?.url ??
      DEFAULT_CONFIG.objectStoreUrl,
    objectStoreToken:
      overrides.objectStoreToken ??
      env.CALENDAR_GRAPH_OBJECTSTORE_TOKEN ??
      yaml?.objectstore?.token ??
      DEFAULT_CONFIG.objectStoreToken,
    graphLayerUrl:
      overrides.graphLayerUrl ??
      env.CALENDAR_GRAPH_GRAPHLAYER_URL ??
      yaml?.graphlayer?.url ??
      DEFAULT_CONFIG.graphLayerUrl,
    graphToken:
      overrides.graphToken ??
      env.CALENDAR_GRAPH_TOKEN ??
      yaml?.graphlayer?.token ??
      DEFAULT_CONFIG.graphToken,
    timezone:
      overrides.timezone ??
      env.CALENDAR_GRAPH_TIMEZONE ??
      yaml?.timezone ??
      DEFAULT_CONFIG.timezone,
    importConcurrency:
      overrides.importConcurrency ??
      yaml?.import?.concurrency ??
      DEFAULT_CONFIG.importConcurrency,
    requestTimeoutMs:
      overrides.requestTimeoutMs ??
      yaml?.request?.timeoutMs ??
      yaml?.request?.timeout_ms ??
      DEFAULT_CONFIG.requestTimeoutMs,
  }

  validateConfig(config)
  return config
}

/** Throws ConfigError on the first invalid value */
export function validateConfig(config: CalendarGraphConfig): void {
  for (const [key, value] of [
    ['objectStoreUrl', config.objectStoreUrl],
    ['graphLayerUrl', config.graphLayerUrl],
  ] as const) {
    if (!z.string().url().safeParse(value).success) {
      throw new ConfigError(`${key} is not a valid URL: ${value}`)
    }
  }
  if (!Number.isInteger(config.importConcurrency) || config.importConcurrency < 1) {
    throw new ConfigError(`importConcurrency must be a positive integer, got ${config.importConcurrency}`)
  }
  if (!Number.isFinite(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
    throw new ConfigError(`requestTimeoutMs must be positive, got ${config.requestTimeoutMs}`)
  }
  resolveTimezone(config.timezone)
}
