import { Database } from '../storage/database.js'
import { VectorStore, compareByRecency } from '../context/vector-store.js'
import { cosineSimilarity } from '../context/math.js'
import type { AntiPatternWarning, ContextItem, ContextKind, PatternLink } from '../context/types.js'

export interface TransferEngineOptions {
  antiPatternThreshold: number
  alternativeThreshold: number
  transferableKinds: ContextKind[]
}

export interface AntiPatternCandidate {
  embedding: number[] | null
  /** Id of the stored item being checked, so it never matches itself. */
  excludeId?: string
  subjectId?: string | null
}

function sharesTag(a: string[], b: string[]): boolean {
  if (a.length === 0 || b.length === 0) return false
  const set = new Set(a)
  return b.some(tag => set.has(tag))
}

export class PatternTransferEngine {
  private db: Database
  private store: VectorStore
  private options: TransferEngineOptions

  constructor(db: Database, store: VectorStore, options: TransferEngineOptions) {
    this.db = db
    this.store = store
    this.options = options
  }

  /** Served from the last computed link set; may lag the stores by one recompute interval. */
  findCrossTechnologyCandidates(patternId: string, targetTechnology: string): PatternLink[] {
    return this.db.getPatternLinks(patternId, targetTechnology.trim().toLowerCase())
  }

  getLink(id: string): PatternLink | null {
    return this.db.getPatternLink(id)
  }

  detectAntiPatterns(
    candidate: AntiPatternCandidate,
    developerId: string,
    technologies: string[]
  ): AntiPatternWarning[] {
    if (!candidate.embedding) return []

    const antiPatterns = this.store.listByKind('anti_pattern', { embeddedOnly: true })
      .filter(ap => ap.id !== candidate.excludeId)
      .filter(ap => ap.developerId === developerId || sharesTag(ap.technologyTags, technologies))

    const matches: { item: ContextItem; similarity: number }[] = []
    for (const ap of antiPatterns) {
      const similarity = cosineSimilarity(candidate.embedding, ap.embedding)
      if (similarity >= this.options.antiPatternThreshold) {
        matches.push({ item: ap, similarity })
      }
    }

    matches.sort((a, b) => {
      if (b.similarity !== a.similarity) return b.similarity - a.similarity
      return a.item.id < b.item.id ? -1 : a.item.id > b.item.id ? 1 : 0
    })

    return matches.map(({ item, similarity }) => ({
      matchedPatternId: item.id,
      similarity,
      suggestedAlternativePatternId: this.suggestAlternative(item, candidate.excludeId),
      subjectId: candidate.subjectId ?? null
    }))
  }

  /**
   * The best-performing stored pattern addressing the same problem as the
   * anti-pattern, or null. Only items that actually did better qualify.
   */
  private suggestAlternative(antiPattern: ContextItem, excludeId?: string): string | null {
    const siblings = this.store.list({ kinds: this.options.transferableKinds, embeddedOnly: true })
      .filter(item => item.id !== excludeId)
      .filter(item => item.projectId === antiPattern.projectId || sharesTag(item.technologyTags, antiPattern.technologyTags))
      .filter(item => item.outcomeScore > antiPattern.outcomeScore)
      .filter(item => cosineSimilarity(item.embedding, antiPattern.embedding) >= this.options.alternativeThreshold)

    if (siblings.length === 0) return null

    siblings.sort((a, b) => {
      if (b.outcomeScore !== a.outcomeScore) return b.outcomeScore - a.outcomeScore
      return compareByRecency(a, b)
    })
    return siblings[0].id
  }
}
