import { Database } from '../storage/database.js'
import { ProfileStore } from '../profile/profile-store.js'
import { cosineSimilarity } from '../context/math.js'
import type { ContextItem, ContextKind, PatternLink } from '../context/types.js'

export interface LinkRecomputerOptions {
  similarityThreshold: number
  globalPrior: number
  transferableKinds: ContextKind[]
  /** Source patterns scanned between yields to the event loop. */
  batchSize?: number
  now?: () => Date
}

export interface RecomputeResult {
  status: 'completed' | 'aborted'
  linkCount: number
  patternCount: number
  durationMs: number
}

export function linkId(sourcePatternId: string, targetItemId: string, targetTechnology: string): string {
  return `${sourcePatternId}->${targetItemId}@${targetTechnology}`
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}

/**
 * Periodic batch deriving cross-technology PatternLinks from the stored items.
 *
 * Reads both stores, builds the whole link set in memory and swaps it in with
 * one transaction. An aborted run writes nothing, so it can simply be started
 * again from scratch.
 */
export class LinkRecomputer {
  private db: Database
  private profiles: ProfileStore
  private options: LinkRecomputerOptions
  private now: () => Date

  constructor(db: Database, profiles: ProfileStore, options: LinkRecomputerOptions) {
    this.db = db
    this.profiles = profiles
    this.options = options
    this.now = options.now ?? (() => new Date())
  }

  async recompute(signal?: AbortSignal): Promise<RecomputeResult> {
    const started = Date.now()
    const computedAt = this.now()
    const batchSize = this.options.batchSize ?? 100

    const patterns = this.db.queryContextItems({
      kinds: this.options.transferableKinds,
      embeddedOnly: true
    })

    const adoptionCache = new Map<string, number>()
    const links: PatternLink[] = []

    for (let i = 0; i < patterns.length; i++) {
      if (i > 0 && i % batchSize === 0) {
        await yieldToEventLoop()
      }
      if (signal?.aborted) {
        return { status: 'aborted', linkCount: 0, patternCount: patterns.length, durationMs: Date.now() - started }
      }

      const source = patterns[i]
      const sourceTags = new Set(source.technologyTags)
      const sourceTechnology = source.technologyTags[0] ?? null

      for (const target of patterns) {
        if (target.id === source.id || target.kind !== source.kind) continue

        const similarity = cosineSimilarity(source.embedding, target.embedding)
        if (similarity < this.options.similarityThreshold) continue

        for (const tech of target.technologyTags) {
          if (sourceTags.has(tech)) continue

          const adoption = this.adoptionRate(source, sourceTechnology, tech, adoptionCache)
          links.push({
            id: linkId(source.id, target.id, tech),
            sourcePatternId: source.id,
            targetItemId: target.id,
            sourceTechnology,
            targetTechnology: tech,
            adaptedContent: target.content,
            similarity,
            adaptationCost: 1 - similarity,
            successProbability: similarity * adoption,
            computedAt
          })
        }
      }
    }

    if (signal?.aborted) {
      return { status: 'aborted', linkCount: 0, patternCount: patterns.length, durationMs: Date.now() - started }
    }

    this.db.replacePatternLinks(links)

    const durationMs = Date.now() - started
    console.log(`[links] Recomputed ${links.length} pattern links from ${patterns.length} patterns in ${durationMs}ms`)
    return { status: 'completed', linkCount: links.length, patternCount: patterns.length, durationMs }
  }

  private adoptionRate(
    source: ContextItem,
    sourceTechnology: string | null,
    targetTechnology: string,
    cache: Map<string, number>
  ): number {
    if (!sourceTechnology) return this.options.globalPrior

    const key = `${source.developerId}\u0000${sourceTechnology}\u0000${targetTechnology}`
    const cached = cache.get(key)
    if (cached !== undefined) return cached

    const rate = this.profiles.getTransferAdoption(source.developerId, sourceTechnology, targetTechnology) ??
      this.options.globalPrior
    cache.set(key, rate)
    return rate
  }
}
