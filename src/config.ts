import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import type { ContextKind } from './context/types.js'
import type { BudgetUnit } from './budget/budgeter.js'

export interface RecollectConfig {
  embedding: {
    provider: 'voyage' | 'openai'
    model: string
    apiKey?: string
    baseUrl?: string
    timeoutMs: number
  }
  summarizer: {
    enabled: boolean
    provider: 'openai' | 'cerebras' | 'ollama' | 'openrouter'
    model: string
    apiKey?: string
    baseUrl?: string
    maxOutputTokens: number
  }
  ranking: {
    weights: {
      semantic: number
      preference: number
      temporal: number
      scope: number
    }
    crossProjectDiscount: number
    halfLifeDays: number
    accessBoost: number
  }
  profile: {
    step: number
    observationDelta: number
    antiPatternThreshold: number
    snapshotEveryUpdates: number
    snapshotIntervalDays: number
    evolutionLogLimit: number
  }
  store: {
    outcomeStep: number
  }
  transfer: {
    similarityThreshold: number
    antiPatternThreshold: number
    alternativeThreshold: number
    globalPrior: number
    transferableKinds: ContextKind[]
    recomputeIntervalMinutes: number
  }
  budget: {
    defaultUnit: BudgetUnit
    charsPerToken: number
    minCompressedUnits: number
  }
  retention: {
    maxAgeDays: number
    idleDays: number
    maxAccessCount: number
    maxOutcomeScore: number
  }
  storage: {
    dbPath: string
  }
}

export const DEFAULT_CONFIG: RecollectConfig = {
  embedding: {
    provider: 'voyage',
    model: 'voyage-code-3',
    timeoutMs: 15000
  },
  summarizer: {
    enabled: false,
    provider: 'openai',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
    maxOutputTokens: 512
  },
  ranking: {
    weights: {
      semantic: 0.40,
      preference: 0.25,
      temporal: 0.20,
      scope: 0.15
    },
    crossProjectDiscount: 0.6,
    halfLifeDays: 30,
    accessBoost: 0.25
  },
  profile: {
    step: 0.1,
    observationDelta: 0.5,
    antiPatternThreshold: 0.35,
    snapshotEveryUpdates: 50,
    snapshotIntervalDays: 7,
    evolutionLogLimit: 52
  },
  store: {
    outcomeStep: 0.05
  },
  transfer: {
    similarityThreshold: 0.55,
    antiPatternThreshold: 0.8,
    alternativeThreshold: 0.55,
    globalPrior: 0.5,
    transferableKinds: ['code_pattern', 'decision'],
    recomputeIntervalMinutes: 60
  },
  budget: {
    defaultUnit: 'tokens',
    charsPerToken: 4,
    minCompressedUnits: 16
  },
  retention: {
    maxAgeDays: 180,
    idleDays: 90,
    maxAccessCount: 1,
    maxOutcomeScore: 0.3
  },
  storage: {
    dbPath: '~/.recollect/context.db'
  }
}

export const CONFIG_DIR = path.join(homedir(), '.recollect')
export const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepMerge<T extends object>(target: T, source: Record<string, unknown>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target))
  for (const key of Object.keys(source)) {
    const next = source[key]
    const current = result[key]
    if (isPlainObject(next)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, next)
    } else if (next !== undefined) {
      result[key] = next
    }
  }
  return result as T
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    if (isPlainObject(parsed)) return parsed
    console.error(`[config] Ignoring ${configPath}: top level is not an object`)
  } catch (e) {
    console.error(`[config] Failed to load ${configPath}:`, e)
  }
  return {}
}

export function loadConfig(configPath: string = CONFIG_PATH): RecollectConfig {
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), readConfigFile(configPath))

  // API keys from the environment fill in only when the file sets none
  if (!merged.embedding.apiKey) {
    merged.embedding.apiKey = merged.embedding.provider === 'voyage'
      ? process.env.VOYAGE_API_KEY
      : process.env.OPENAI_API_KEY
  }
  if (!merged.summarizer.apiKey && process.env.OPENAI_API_KEY) {
    merged.summarizer.apiKey = process.env.OPENAI_API_KEY
  }
  // The database path from the environment overrides the file
  if (process.env.RECOLLECT_DB_PATH) {
    merged.storage.dbPath = process.env.RECOLLECT_DB_PATH
  }

  return merged
}

export function saveConfig(config: Partial<RecollectConfig> | Record<string, unknown>, configPath: string = CONFIG_PATH): void {
  mkdirSync(path.dirname(configPath), { recursive: true })

  // Merge into whatever is on disk so unrelated keys survive
  const merged = deepMerge(readConfigFile(configPath), { ...config })
  writeFileSync(configPath, JSON.stringify(merged, null, 2))
}

export function resolveDbPath(dbPath: string): string {
  return dbPath.startsWith('~') ? path.join(homedir(), dbPath.slice(1)) : dbPath
}

export interface ConfigError {
  field: string
  message: string
}

function checkUnit(errors: ConfigError[], field: string, value: number): void {
  if (!(value >= 0 && value <= 1)) {
    errors.push({ field, message: `${field} must be within [0, 1], got ${value}` })
  }
}

function checkStep(errors: ConfigError[], field: string, value: number): void {
  if (!(value > 0 && value <= 1)) {
    errors.push({ field, message: `${field} must be within (0, 1], got ${value}` })
  }
}

function checkPositive(errors: ConfigError[], field: string, value: number): void {
  if (!(value > 0)) {
    errors.push({ field, message: `${field} must be positive, got ${value}` })
  }
}

export function validateConfig(config: RecollectConfig, options: { requireApiKeys?: boolean } = {}): ConfigError[] {
  const errors: ConfigError[] = []

  const w = config.ranking.weights
  for (const [name, value] of Object.entries(w)) {
    if (!(value >= 0)) {
      errors.push({ field: `ranking.weights.${name}`, message: `ranking.weights.${name} must be non-negative, got ${value}` })
    }
  }
  const total = w.semantic + w.preference + w.temporal + w.scope
  if (Math.abs(total - 1) > 1e-6) {
    errors.push({ field: 'ranking.weights', message: `ranking.weights must sum to 1, got ${total}` })
  }

  checkUnit(errors, 'ranking.crossProjectDiscount', config.ranking.crossProjectDiscount)
  checkPositive(errors, 'ranking.halfLifeDays', config.ranking.halfLifeDays)
  if (!(config.ranking.accessBoost >= 0)) {
    errors.push({ field: 'ranking.accessBoost', message: `ranking.accessBoost must be non-negative, got ${config.ranking.accessBoost}` })
  }

  checkStep(errors, 'profile.step', config.profile.step)
  checkStep(errors, 'profile.observationDelta', config.profile.observationDelta)
  checkUnit(errors, 'profile.antiPatternThreshold', config.profile.antiPatternThreshold)
  checkPositive(errors, 'profile.snapshotEveryUpdates', config.profile.snapshotEveryUpdates)
  checkPositive(errors, 'profile.snapshotIntervalDays', config.profile.snapshotIntervalDays)
  checkPositive(errors, 'profile.evolutionLogLimit', config.profile.evolutionLogLimit)

  checkStep(errors, 'store.outcomeStep', config.store.outcomeStep)

  checkUnit(errors, 'transfer.similarityThreshold', config.transfer.similarityThreshold)
  checkUnit(errors, 'transfer.antiPatternThreshold', config.transfer.antiPatternThreshold)
  checkUnit(errors, 'transfer.alternativeThreshold', config.transfer.alternativeThreshold)
  checkUnit(errors, 'transfer.globalPrior', config.transfer.globalPrior)
  checkPositive(errors, 'transfer.recomputeIntervalMinutes', config.transfer.recomputeIntervalMinutes)

  checkPositive(errors, 'budget.charsPerToken', config.budget.charsPerToken)
  checkPositive(errors, 'retention.maxAgeDays', config.retention.maxAgeDays)

  if (options.requireApiKeys) {
    if (!config.embedding.apiKey) {
      const envName = config.embedding.provider === 'voyage' ? 'VOYAGE_API_KEY' : 'OPENAI_API_KEY'
      errors.push({
        field: 'embedding.apiKey',
        message: `No API key for the ${config.embedding.provider} embedding provider. Set ${envName} or embedding.apiKey in ${CONFIG_PATH}`
      })
    }
    // Ollama runs locally without a key
    if (config.summarizer.enabled && !config.summarizer.apiKey && config.summarizer.provider !== 'ollama') {
      errors.push({
        field: 'summarizer.apiKey',
        message: `Summarizer is enabled but has no API key. Set OPENAI_API_KEY or summarizer.apiKey in ${CONFIG_PATH}`
      })
    }
  }

  return errors
}
