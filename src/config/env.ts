import 'dotenv/config'
import fs from 'fs'
import path from 'path'
import { parse as parseIni } from 'ini'
import { z } from 'zod'

// ============================================================================
// Sources - INI file sections, each key overridable by one env variable
// ============================================================================

/**
 * Env prefix per INI section. `[home] home_id` reads NETATMO_HOME_ID,
 * `[logging] severity` reads NETATMO_LOG_SEVERITY, and so on.
 */
const SECTION_ENV_PREFIX = {
  credentials: 'NETATMO_CREDENTIALS_',
  home: 'NETATMO_',
  mqtt: 'NETATMO_MQTT_',
  global: 'NETATMO_GLOBAL_',
  logging: 'NETATMO_LOG_',
  http: 'NETATMO_HTTP_',
  api: 'NETATMO_API_',
  monitor: 'NETATMO_MONITOR_',
} as const

const DEFAULT_CONFIG_FILE = 'netatmo.ini'

/**
 * Keys read verbatim from the file. The INI parser cuts an unquoted value at
 * `;` or `#`, which secrets may contain; the container entrypoint writes them
 * unquoted.
 */
const VERBATIM_KEYS = new Map<string, ReadonlySet<string>>([
  ['credentials', new Set(['client_id', 'client_secret', 'username', 'password', 'refresh_token'])],
  ['mqtt', new Set(['username', 'password'])],
])

const booleanString = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value.toLowerCase()))

const commaList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform(value =>
      value
        .split(',')
        .map(item => item.trim())
        .filter(item => item !== '')
    )

const SEVERITY_LEVELS = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  warn: 'warn',
  error: 'error',
  critical: 'fatal',
  fatal: 'fatal',
  silent: 'silent',
} as const

// ============================================================================
// Schema
// ============================================================================

const fileSchema = z.object({
  credentials: z
    .object({
      client_id: z.string().min(1),
      client_secret: z.string().min(1),
      username: z.string().optional(),
      password: z.string().optional(),
      refresh_token: z.string().optional(),
      scopes: z.string().default('read_thermostat write_thermostat'),
    })
    .refine(c => Boolean(c.refresh_token) || (Boolean(c.username) && Boolean(c.password)), {
      message: 'either refresh_token or username and password are required',
    }),
  home: z.object({
    home_id: z.string().min(1),
  }),
  mqtt: z.object({
    topic: z.string().min(1).default('netatmo'),
    broker: z.string().min(1).default('127.0.0.1'),
    port: z.coerce.number().int().min(1).max(65535).default(1883),
    username: z.string().optional(),
    password: z.string().optional(),
    keepalive: z.coerce.number().int().min(0).default(60),
    tls: booleanString('false'),
  }),
  global: z.object({
    frequency: z.coerce.number().int().positive().default(300),
  }),
  logging: z.object({
    severity: z
      .string()
      .default('INFO')
      .transform(value => value.toLowerCase())
      .pipe(z.enum(['debug', 'info', 'warning', 'warn', 'error', 'critical', 'fatal', 'silent']))
      .transform(value => SEVERITY_LEVELS[value]),
    filename: z.string().optional(),
  }),
  http: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().min(1).max(65535).default(5000),
  }),
  api: z.object({
    base_url: z.string().url().default('https://api.netatmo.com'),
    timeout: z.coerce.number().positive().default(15),
  }),
  monitor: z.object({
    enabled: booleanString('false'),
    check_rounds: z.coerce.number().int().positive().default(6),
    temp_delta: z.coerce.number().positive().default(0.5),
    valve_detection: booleanString('true'),
    valve_types: commaList('NRV,VALVE'),
    valve_active_keys: commaList('valve_position,valve,position,open,heating_power_request,valve_level'),
  }),
})

type RawConfig = z.infer<typeof fileSchema>

export type LogSeverity = RawConfig['logging']['severity']

export interface AppConfig {
  readonly credentials: {
    readonly clientId: string
    readonly clientSecret: string
    readonly username?: string
    readonly password?: string
    readonly refreshToken?: string
    readonly scopes: string
  }
  readonly home: { readonly homeId: string }
  readonly mqtt: {
    readonly topic: string
    readonly broker: string
    readonly port: number
    readonly username?: string
    readonly password?: string
    readonly keepalive: number
    readonly tls: boolean
  }
  readonly global: { readonly frequencySeconds: number }
  readonly logging: { readonly severity: LogSeverity; readonly filename?: string }
  readonly http: { readonly host: string; readonly port: number }
  readonly api: { readonly baseUrl: string; readonly timeoutMs: number }
  readonly monitor: {
    readonly enabled: boolean
    readonly checkRounds: number
    readonly tempDelta: number
    readonly valveDetection: boolean
    readonly valveTypes: readonly string[]
    readonly valveActiveKeys: readonly string[]
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read the INI file into plain string sections. A missing file is not an
 * error: the container may provide everything through the environment.
 */
export function readIniFile(filePath: string): Record<string, Record<string, string>> {
  if (!fs.existsSync(filePath)) return {}

  let text: string
  let parsed: Record<string, unknown>
  try {
    text = fs.readFileSync(filePath, 'utf-8')
    parsed = parseIni(text)
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage}`)
  }

  const sections: Record<string, Record<string, string>> = {}
  for (const [name, section] of Object.entries(parsed)) {
    if (typeof section !== 'object' || section === null) continue
    const values: Record<string, string> = {}
    for (const [key, value] of Object.entries(section)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        values[key] = String(value).trim()
      }
    }
    sections[name] = values
  }

  for (const [section, values] of Object.entries(readVerbatimValues(text))) {
    sections[section] = { ...sections[section], ...values }
  }
  return sections
}

/**
 * Raw text of the unquoted VERBATIM_KEYS values, comment characters included.
 * Quoted values are left to the INI parser.
 */
export function readVerbatimValues(text: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {}
  let keys: ReadonlySet<string> | undefined
  let section = ''

  for (const line of text.split(/\r?\n/)) {
    const header = line.match(/^\s*\[([^\]]+)\]\s*$/)
    if (header) {
      section = header[1].trim()
      keys = VERBATIM_KEYS.get(section)
      continue
    }
    if (!keys) continue

    const entry = line.match(/^\s*([^=;#\s][^=]*?)\s*=(.*)$/)
    if (!entry || !keys.has(entry[1])) continue

    const value = entry[2].trim()
    if (value.startsWith('"') || value.startsWith("'")) continue

    result[section] = { ...result[section], [entry[1]]: value }
  }
  return result
}

/**
 * Merge file and environment. Empty values count as unset, since the
 * container entrypoint writes `key = ` for every variable it was not given.
 * Unknown keys are dropped later by the schema.
 */
export function mergeSources(
  fileSections: Record<string, Record<string, string>>,
  env: NodeJS.ProcessEnv
): Record<string, Record<string, string>> {
  const merged: Record<string, Record<string, string>> = {}

  for (const [section, prefix] of Object.entries(SECTION_ENV_PREFIX)) {
    const values: Record<string, string> = {}
    for (const [key, value] of Object.entries(fileSections[section] ?? {})) {
      if (value !== '') values[key] = value
    }

    for (const [name, value] of Object.entries(env)) {
      if (!name.startsWith(prefix) || value === undefined || value.trim() === '') continue
      values[name.slice(prefix.length).toLowerCase()] = value.trim()
    }
    merged[section] = values
  }

  return merged
}

function toAppConfig(raw: RawConfig): AppConfig {
  return Object.freeze({
    credentials: Object.freeze({
      clientId: raw.credentials.client_id,
      clientSecret: raw.credentials.client_secret,
      username: raw.credentials.username,
      password: raw.credentials.password,
      refreshToken: raw.credentials.refresh_token,
      scopes: raw.credentials.scopes,
    }),
    home: Object.freeze({ homeId: raw.home.home_id }),
    mqtt: Object.freeze({ ...raw.mqtt }),
    global: Object.freeze({ frequencySeconds: raw.global.frequency }),
    logging: Object.freeze({ ...raw.logging }),
    http: Object.freeze({ ...raw.http }),
    api: Object.freeze({
      baseUrl: raw.api.base_url.replace(/\/+$/, ''),
      timeoutMs: Math.round(raw.api.timeout * 1000),
    }),
    monitor: Object.freeze({
      enabled: raw.monitor.enabled,
      checkRounds: raw.monitor.check_rounds,
      tempDelta: raw.monitor.temp_delta,
      valveDetection: raw.monitor.valve_detection,
      valveTypes: Object.freeze(raw.monitor.valve_types.map(type => type.toUpperCase())),
      valveActiveKeys: Object.freeze([...raw.monitor.valve_active_keys]),
    }),
  })
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const filePath = path.resolve(env.NETATMO_CONFIG_FILE || DEFAULT_CONFIG_FILE)
  const merged = mergeSources(readIniFile(filePath), env)

  const result = fileSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration (${filePath})`, issues)
  }

  return toAppConfig(result.data)
}
