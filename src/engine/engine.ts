import { nanoid } from 'nanoid'
import { Database } from '../storage/database.js'
import { VectorStore, hashContent, type RetentionPolicy } from '../context/vector-store.js'
import { ProfileStore, cloneProfile } from '../profile/profile-store.js'
import { Ranker, type ScoredItem } from '../ranking/ranker.js'
import { PatternTransferEngine } from '../transfer/transfer-engine.js'
import { LinkRecomputer, type RecomputeResult } from '../transfer/link-recomputer.js'
import { fitToBudget, applySummaries, type BudgetUnit, type FittedContext, type Summarizer } from '../budget/budgeter.js'
import type { RawSourceExtractor } from '../ingest/extractor.js'
import type { EmbedFn } from '../providers/embeddings.js'
import type { RecollectConfig } from '../config.js'
import { normalizeTags } from '../context/types.js'
import type {
  AntiPatternWarning,
  ContextKind,
  DeveloperProfile,
  PatternLink,
  Project
} from '../context/types.js'
import {
  DuplicateContentError,
  EmbeddingUnavailableError,
  InvalidInputError,
  InvalidScopeError,
  NotFoundError
} from '../errors.js'

export interface ContextEngineParams {
  db: Database
  config: RecollectConfig
  embedFn: EmbedFn
  summarizer?: Summarizer | null
  now?: () => Date
}

export interface StoreRequest {
  projectId: string
  developerId: string
  kind: ContextKind
  content: string
  technologyTags: string[]
  metadata?: Record<string, unknown>
  createdAt?: Date
}

export interface RetrieveRequest {
  queryText: string
  developerId: string
  projectId: string
  technologyScope?: string[] | null
  crossProject?: boolean
  k: number
  budgetUnits: number
  unit?: BudgetUnit
  compress?: boolean
}

export interface RetrievalResult extends FittedContext {
  warnings: AntiPatternWarning[]
  substitutes: PatternLink[]
  /** Semantic scoring was skipped because the query could not be embedded. */
  degraded: boolean
}

export interface IngestResult {
  stored: number
  duplicates: number
  failed: number
}

export interface EngineStats {
  projects: number
  totalItems: number
  items: Record<ContextKind, number>
  missingEmbeddings: number
  patternLinks: number
  lastLinkComputation: Date | null
  retrievals: { total: number; degraded: number }
}

export class ContextEngine {
  readonly vectors: VectorStore
  readonly profiles: ProfileStore
  readonly ranker: Ranker
  readonly transfer: PatternTransferEngine
  readonly links: LinkRecomputer

  private db: Database
  private config: RecollectConfig
  private embedFn: EmbedFn
  private summarizer: Summarizer | null
  private now: () => Date

  constructor(params: ContextEngineParams) {
    this.db = params.db
    this.config = params.config
    this.embedFn = params.embedFn
    this.summarizer = params.summarizer ?? null
    this.now = params.now ?? (() => new Date())

    const cfg = params.config
    this.vectors = new VectorStore(this.db, { outcomeStep: cfg.store.outcomeStep })
    this.profiles = new ProfileStore(this.db, { ...cfg.profile, now: this.now })
    this.ranker = new Ranker(this.vectors, this.profiles, { ...cfg.ranking, now: this.now })
    this.transfer = new PatternTransferEngine(this.db, this.vectors, cfg.transfer)
    this.links = new LinkRecomputer(this.db, this.profiles, { ...cfg.transfer, now: this.now })
  }

  // --- Projects ---

  createProject(input: { id?: string; name: string; technologies: string[] }): Project {
    const project: Project = {
      id: input.id ?? nanoid(),
      name: input.name,
      technologies: normalizeTags(input.technologies),
      createdAt: this.now()
    }
    if (!this.db.insertProject(project)) {
      const existing = this.db.getProject(project.id)
      if (existing) return existing
    }
    return project
  }

  getProject(id: string): Project | null {
    return this.db.getProject(id)
  }

  listProjects(): Project[] {
    return this.db.listProjects()
  }

  // --- Writes ---

  async store(request: StoreRequest): Promise<string> {
    if (request.content.trim() === '') {
      throw new InvalidInputError('Cannot store empty content')
    }
    if (!this.db.getProject(request.projectId)) {
      throw new InvalidScopeError(request.projectId)
    }
    // Checked again inside put(); this one just avoids paying for an embedding
    const existingId = this.db.findContextItemIdByHash(request.projectId, hashContent(request.content))
    if (existingId) {
      throw new DuplicateContentError(existingId, request.projectId)
    }

    let embedding: number[] | null = null
    try {
      embedding = await this.embedFn(request.content)
    } catch (e) {
      if (!(e instanceof EmbeddingUnavailableError)) throw e
      console.error(`[store] Embedding unavailable, storing without one for backfill: ${e.message}`)
    }

    const item = this.vectors.put({
      projectId: request.projectId,
      developerId: request.developerId,
      kind: request.kind,
      content: request.content,
      technologyTags: request.technologyTags,
      embedding,
      createdAt: request.createdAt ?? this.now(),
      metadata: request.metadata
    })

    for (const tech of item.technologyTags) {
      this.profiles.updateOnObservation(request.developerId, tech, this.config.profile.observationDelta)
    }
    if (item.kind === 'anti_pattern') {
      this.profiles.flagAntiPattern(request.developerId, item.id)
    }

    return item.id
  }

  /**
   * Feedback on a stored item or on a PatternLink. Items move their outcome
   * score and their owner's profile; links move the owner's adoption rate
   * for that technology pair.
   */
  reportOutcome(id: string, success: boolean): void {
    const item = this.vectors.get(id)
    if (item) {
      this.vectors.recordOutcome(id, success)
      this.profiles.updateOnOutcome(item.developerId, {
        patternId: item.id,
        success,
        technologies: item.technologyTags,
        knownAntiPattern: item.kind === 'anti_pattern'
      })
      return
    }

    const link = this.transfer.getLink(id)
    if (!link) {
      throw new NotFoundError(id, 'item or pattern link')
    }
    const source = this.vectors.get(link.sourcePatternId)
    if (!source) {
      throw new NotFoundError(link.sourcePatternId)
    }

    this.vectors.recordOutcome(link.targetItemId, success)
    if (link.sourceTechnology) {
      this.profiles.updateOnTransferOutcome(source.developerId, link.sourceTechnology, link.targetTechnology, success)
    }
  }

  // --- Reads ---

  async retrieve(request: RetrieveRequest): Promise<RetrievalResult> {
    const unit = request.unit ?? this.config.budget.defaultUnit
    let project: Project | null
    try {
      project = this.db.getProject(request.projectId)
    } catch (e) {
      console.error('[retrieve] Project lookup failed, returning no context:', e)
      return emptyResult(unit, request.budgetUnits, true)
    }
    if (!project) {
      return emptyResult(unit, request.budgetUnits, false)
    }

    let queryEmbedding: number[] | null = null
    let degraded = false
    try {
      queryEmbedding = await this.embedFn(request.queryText)
    } catch (e) {
      degraded = true
      console.error('[retrieve] Query embedding failed, ranking without semantic similarity:', e)
    }

    let ranked: ScoredItem[]
    try {
      ranked = this.ranker.rank(
        { embedding: queryEmbedding },
        request.developerId,
        {
          projectId: request.projectId,
          technologyScope: request.technologyScope,
          crossProject: request.crossProject
        },
        request.k
      )
    } catch (e) {
      console.error('[retrieve] Ranking failed, returning no context:', e)
      return emptyResult(unit, request.budgetUnits, true)
    }

    let fitted = fitToBudget(ranked, request.budgetUnits, {
      unit,
      compress: request.compress,
      charsPerToken: this.config.budget.charsPerToken,
      minCompressedUnits: this.config.budget.minCompressedUnits
    })
    if (this.summarizer && fitted.items.some(i => i.isSummary)) {
      fitted = await applySummaries(fitted, this.summarizer, { charsPerToken: this.config.budget.charsPerToken })
    }

    const technologies = normalizeTags(
      request.technologyScope && request.technologyScope.length > 0 ? request.technologyScope : project.technologies
    )
    const warnings = this.collectWarnings(queryEmbedding, fitted, request.developerId, technologies)
    const substitutes = this.collectSubstitutes(fitted, technologies)

    this.ranker.recordRetrieval(fitted.items)
    try {
      this.db.logRetrieval({
        timestamp: this.now(),
        developerId: request.developerId,
        projectId: request.projectId,
        query: request.queryText,
        resultCount: fitted.items.length,
        degraded
      })
    } catch (e) {
      console.error('[retrieve] Failed to log retrieval:', e)
    }

    return { ...fitted, warnings, substitutes, degraded }
  }

  getProfileSummary(developerId: string): DeveloperProfile {
    return cloneProfile(this.profiles.getProfile(developerId))
  }

  getProfileHistory(developerId: string, technology: string): { takenAt: Date; weight: number }[] {
    return this.profiles.getHistory(developerId, technology.trim().toLowerCase())
  }

  findTransfers(patternId: string, targetTechnology: string): PatternLink[] {
    return this.transfer.findCrossTechnologyCandidates(patternId, targetTechnology)
  }

  async detectAntiPatterns(content: string, developerId: string, technologies: string[]): Promise<AntiPatternWarning[]> {
    let embedding: number[]
    try {
      embedding = await this.embedFn(content)
    } catch (e) {
      console.error('[antipatterns] Could not embed candidate content:', e)
      return []
    }
    return this.transfer.detectAntiPatterns({ embedding }, developerId, normalizeTags(technologies))
  }

  // --- Maintenance ---

  async ingest(
    extractor: RawSourceExtractor,
    projectPath: string,
    projectId: string,
    developerId: string
  ): Promise<IngestResult> {
    const observations = await extractor.extractObservations(projectPath)
    const result: IngestResult = { stored: 0, duplicates: 0, failed: 0 }

    for (const obs of observations) {
      try {
        await this.store({
          projectId,
          developerId,
          kind: obs.kind,
          content: obs.content,
          technologyTags: obs.technologyTags,
          metadata: obs.metadata,
          createdAt: obs.observedAt
        })
        result.stored++
      } catch (e) {
        if (e instanceof DuplicateContentError) {
          result.duplicates++
        } else if (e instanceof InvalidScopeError) {
          throw e
        } else {
          result.failed++
          console.error(`[ingest] Failed to store observation from ${projectPath}:`, e)
        }
      }
    }

    console.log(`[ingest] ${projectPath}: ${result.stored} stored, ${result.duplicates} duplicates, ${result.failed} failed`)
    return result
  }

  /** Embeds items stored while the provider was down. Stops at the first provider failure. */
  async backfillEmbeddings(limit: number = 100): Promise<number> {
    const pending = this.vectors.listMissingEmbeddings(limit)
    let filled = 0

    for (const item of pending) {
      try {
        const embedding = await this.embedFn(item.content)
        if (this.vectors.setEmbedding(item.id, embedding)) filled++
      } catch (e) {
        if (e instanceof EmbeddingUnavailableError) {
          console.error(`[backfill] Provider unavailable, ${pending.length - filled} items still pending`)
          break
        }
        throw e
      }
    }

    return filled
  }

  purge(policy: RetentionPolicy = this.config.retention): number {
    const removed = this.vectors.purge(policy, this.now())
    if (removed > 0) {
      console.log(`[retention] Purged ${removed} stale context items`)
    }
    return removed
  }

  recomputeLinks(signal?: AbortSignal): Promise<RecomputeResult> {
    return this.links.recompute(signal)
  }

  stats(): EngineStats {
    return {
      projects: this.db.listProjects().length,
      totalItems: this.vectors.count(),
      items: this.db.countContextItemsByKind(),
      missingEmbeddings: this.db.countContextItemsMissingEmbedding(),
      patternLinks: this.db.countPatternLinks(),
      lastLinkComputation: this.db.lastLinkComputation(),
      retrievals: this.db.countRetrievals()
    }
  }

  // --- Internals ---

  private collectWarnings(
    queryEmbedding: number[] | null,
    fitted: FittedContext,
    developerId: string,
    technologies: string[]
  ): AntiPatternWarning[] {
    try {
      const warnings = this.transfer.detectAntiPatterns(
        { embedding: queryEmbedding, subjectId: null },
        developerId,
        technologies
      )
      for (const fittedItem of fitted.items) {
        const item = fittedItem.item
        if (item.kind === 'anti_pattern') continue
        warnings.push(...this.transfer.detectAntiPatterns(
          { embedding: item.embedding, excludeId: item.id, subjectId: item.id },
          developerId,
          technologies.length > 0 ? technologies : item.technologyTags
        ))
      }
      return warnings
    } catch (e) {
      console.error('[retrieve] Anti-pattern check failed:', e)
      return []
    }
  }

  private collectSubstitutes(fitted: FittedContext, technologies: string[]): PatternLink[] {
    const transferable = new Set<ContextKind>(this.config.transfer.transferableKinds)
    const substitutes: PatternLink[] = []
    try {
      for (const { item } of fitted.items) {
        if (!transferable.has(item.kind)) continue
        for (const tech of technologies) {
          if (item.technologyTags.includes(tech)) continue
          const [best] = this.transfer.findCrossTechnologyCandidates(item.id, tech)
          if (best) substitutes.push(best)
        }
      }
    } catch (e) {
      console.error('[retrieve] Pattern transfer lookup failed:', e)
    }
    return substitutes
  }
}

function emptyResult(unit: BudgetUnit, maxUnits: number, degraded: boolean): RetrievalResult {
  return {
    items: [],
    unit,
    maxUnits: Math.max(0, Math.floor(maxUnits)),
    usedUnits: 0,
    dropped: [],
    warnings: [],
    substitutes: [],
    degraded
  }
}
