import { VectorStore, compareByRecency } from '../context/vector-store.js'
import { ProfileStore } from '../profile/profile-store.js'
import { confidenceOrNeutral } from '../profile/confidence.js'
import { clamp01 } from '../context/math.js'
import type { ContextItem, DeveloperProfile } from '../context/types.js'

export interface RankingWeights {
  semantic: number
  preference: number
  temporal: number
  scope: number
}

export interface RankerOptions {
  weights: RankingWeights
  crossProjectDiscount: number
  halfLifeDays: number
  accessBoost: number
  now?: () => Date
}

export interface RankQuery {
  /** Null when the embedding provider could not embed the query. */
  embedding: number[] | null
}

export interface ProjectContext {
  projectId: string
  technologyScope?: string[] | null
  crossProject?: boolean
}

export interface ScoreComponents {
  semantic: number
  preference: number
  temporal: number
  scope: number
}

export interface ScoredItem {
  item: ContextItem
  score: number
  components: ScoreComponents
}

const MS_PER_DAY = 24 * 60 * 60 * 1000

export function preferenceAlignment(item: ContextItem, profile: DeveloperProfile): number {
  let techScore: number | null = null
  if (item.technologyTags.length > 0) {
    let sum = 0
    for (const tag of item.technologyTags) {
      sum += confidenceOrNeutral(profile.technologyWeights, tag).value
    }
    techScore = sum / item.technologyTags.length
  }

  const pattern = profile.patternConfidence.get(item.id)
  if (pattern && techScore !== null) return (techScore + pattern.value) / 2
  if (pattern) return pattern.value
  return techScore ?? 0.5
}

export function temporalRelevance(
  item: ContextItem,
  now: Date,
  options: { halfLifeDays: number; accessBoost: number }
): number {
  const ageDays = Math.max(0, now.getTime() - item.lastAccessedAt.getTime()) / MS_PER_DAY
  const decay = Math.pow(0.5, ageDays / options.halfLifeDays)
  return Math.min(1, decay * (1 + options.accessBoost * Math.log1p(item.accessCount)))
}

export class Ranker {
  private store: VectorStore
  private profiles: ProfileStore
  private options: RankerOptions
  private now: () => Date

  constructor(store: VectorStore, profiles: ProfileStore, options: RankerOptions) {
    this.store = store
    this.profiles = profiles
    this.options = options
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Scores candidates for a query. Never writes: call {@link recordRetrieval}
   * with whatever is actually handed back to the caller.
   */
  rank(query: RankQuery, developerId: string, context: ProjectContext, k: number): ScoredItem[] {
    if (k <= 0) return []

    const projectScope = context.crossProject ? null : context.projectId
    const technologyScope = context.technologyScope && context.technologyScope.length > 0
      ? context.technologyScope
      : null

    // Everything in scope gets the full formula; the cut to k happens after scoring
    const candidates = this.store.getCandidates(query.embedding, projectScope, technologyScope, Number.POSITIVE_INFINITY)
    if (candidates.length === 0) return []

    const profile = this.profiles.getProfile(developerId)
    const now = this.now()
    const w = this.options.weights

    const scored = candidates.map(({ item, similarity }): ScoredItem => {
      const components: ScoreComponents = {
        semantic: query.embedding && item.embedding ? clamp01(similarity) : 0,
        preference: preferenceAlignment(item, profile),
        temporal: temporalRelevance(item, now, this.options),
        scope: item.projectId === context.projectId ? 1 : this.options.crossProjectDiscount
      }
      const score = w.semantic * components.semantic +
        w.preference * components.preference +
        w.temporal * components.temporal +
        w.scope * components.scope
      return { item, score, components }
    })

    scored.sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score
      return compareByRecency(a.item, b.item)
    })

    return scored.slice(0, k)
  }

  recordRetrieval(items: ScoredItem[], at: Date = this.now()): void {
    for (const { item } of items) {
      try {
        this.store.touch(item.id, at)
      } catch (e) {
        // Purged between rank and touch; the counter is a heuristic
        console.error(`[ranker] Failed to record access for ${item.id}:`, e)
      }
    }
  }
}
