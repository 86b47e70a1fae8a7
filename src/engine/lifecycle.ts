import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { Database } from '../storage/database.js'
import { ContextEngine } from './engine.js'
import { RecollectConfig, loadConfig, validateConfig, resolveDbPath } from '../config.js'
import { createEmbedFn, type EmbedFn } from '../providers/embeddings.js'
import { createSummarizer } from '../providers/llm.js'
import type { Summarizer } from '../budget/budgeter.js'

export interface WakeOptions {
  config?: RecollectConfig
  configPath?: string
  /** Overrides the configured embedding provider. */
  embedFn?: EmbedFn
  summarizer?: Summarizer | null
  /** Run link recomputation and embedding backfill on a timer. */
  schedule?: boolean
  /** Fail on missing API keys. Off for read-only tooling. */
  requireApiKeys?: boolean
  /** Skip the startup summary, for commands that print their own output. */
  quiet?: boolean
}

export class EngineLifecycle {
  public db!: Database
  public engine!: ContextEngine
  public config!: RecollectConfig

  private maintenanceTimer: NodeJS.Timeout | null = null
  private maintenanceRun: Promise<void> | null = null
  private abortController: AbortController | null = null

  async wake(options: WakeOptions = {}): Promise<void> {
    // 1. Load config
    this.config = options.config ?? loadConfig(options.configPath)

    // 1b. Validate
    const configErrors = validateConfig(this.config, {
      requireApiKeys: (options.requireApiKeys ?? true) && !options.embedFn
    })
    if (configErrors.length > 0) {
      const details = configErrors.map(e => e.message).join('\n')
      throw new Error(`Invalid configuration:\n${details}`)
    }

    // 2. Open database
    const dbPath = resolveDbPath(this.config.storage.dbPath)
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true })
    }
    this.db = new Database(dbPath)

    // 3. Build the engine
    const summarizer = options.summarizer !== undefined
      ? options.summarizer
      : this.config.summarizer.enabled ? createSummarizer(this.config.summarizer) : null

    this.engine = new ContextEngine({
      db: this.db,
      config: this.config,
      embedFn: options.embedFn ?? createEmbedFn(this.config.embedding),
      summarizer
    })

    if (!options.quiet) {
      const stats = this.engine.stats()
      console.log(`[startup] Database: ${stats.projects} projects, ${stats.totalItems} context items (${stats.missingEmbeddings} awaiting embeddings)`)
      console.log(`[startup] Pattern links: ${stats.patternLinks}, last computed ${stats.lastLinkComputation?.toISOString() ?? 'never'}`)
    }

    // 4. Schedule maintenance
    if (options.schedule) {
      this.scheduleMaintenance()
    }
  }

  async sleep(): Promise<void> {
    // 1. Stop the timer
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer)
      this.maintenanceTimer = null
    }

    // 2. Abort and wait out a running batch; an aborted recompute writes nothing
    this.abortController?.abort()
    if (this.maintenanceRun) {
      await this.maintenanceRun
    }

    // 3. Close database
    this.db.close()
  }

  /** One maintenance pass. A pass already in flight is joined rather than doubled. */
  runMaintenance(): Promise<void> {
    if (this.maintenanceRun) return this.maintenanceRun

    const controller = new AbortController()
    this.abortController = controller

    this.maintenanceRun = (async () => {
      try {
        const filled = await this.engine.backfillEmbeddings()
        if (filled > 0) {
          console.log(`[maintenance] Backfilled ${filled} embeddings`)
        }
        await this.engine.recomputeLinks(controller.signal)
      } catch (e) {
        console.error('[maintenance] Scheduled maintenance failed:', e)
      } finally {
        this.maintenanceRun = null
        this.abortController = null
      }
    })()

    return this.maintenanceRun
  }

  private scheduleMaintenance(): void {
    const intervalMs = this.config.transfer.recomputeIntervalMinutes * 60 * 1000
    this.maintenanceTimer = setInterval(() => {
      void this.runMaintenance()
    }, intervalMs)
    this.maintenanceTimer.unref()
  }
}
