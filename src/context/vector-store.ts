import { createHash } from 'node:crypto'
import { nanoid } from 'nanoid'
import { Database, type ContextItemFilter, type RetentionCutoffs } from '../storage/database.js'
import { cosineSimilarity } from './math.js'
import { normalizeTags } from './types.js'
import type { CandidateMatch, ContextItem, ContextKind } from './types.js'
import { DuplicateContentError, InvalidScopeError, NotFoundError } from '../errors.js'

export interface NewContextItem {
  projectId: string
  developerId: string
  kind: ContextKind
  content: string
  technologyTags: string[]
  embedding: number[] | null
  createdAt?: Date
  metadata?: Record<string, unknown>
}

export interface RetentionPolicy {
  maxAgeDays: number
  idleDays: number
  maxAccessCount: number
  maxOutcomeScore: number
}

const MS_PER_DAY = 24 * 60 * 60 * 1000

export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex')
}

// Newer first, then id, so equal scores always come back in the same order
export function compareByRecency(a: ContextItem, b: ContextItem): number {
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime()
  if (byCreated !== 0) return byCreated
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

export class VectorStore {
  private db: Database
  private outcomeStep: number

  constructor(db: Database, options: { outcomeStep: number }) {
    this.db = db
    this.outcomeStep = options.outcomeStep
  }

  put(input: NewContextItem): ContextItem {
    if (!this.db.getProject(input.projectId)) {
      throw new InvalidScopeError(input.projectId)
    }

    const contentHash = hashContent(input.content)
    const existingId = this.db.findContextItemIdByHash(input.projectId, contentHash)
    if (existingId) {
      throw new DuplicateContentError(existingId, input.projectId)
    }

    const createdAt = input.createdAt ?? new Date()
    const item: ContextItem = {
      id: nanoid(),
      projectId: input.projectId,
      developerId: input.developerId,
      kind: input.kind,
      technologyTags: normalizeTags(input.technologyTags),
      content: input.content,
      contentHash,
      embedding: input.embedding,
      createdAt,
      lastAccessedAt: createdAt,
      accessCount: 0,
      outcomeScore: 0.5,
      metadata: input.metadata ?? {}
    }

    try {
      this.db.insertContextItem(item)
    } catch (err) {
      // Another connection stored the same content between our lookup and insert
      if (isUniqueViolation(err)) {
        const winner = this.db.findContextItemIdByHash(input.projectId, contentHash)
        if (winner) throw new DuplicateContentError(winner, input.projectId)
      }
      throw err
    }
    return item
  }

  get(id: string): ContextItem | null {
    return this.db.getContextItem(id)
  }

  /**
   * Flat cosine scan over the items in scope.
   *
   * `projectScope` null searches every project. A null query vector (or an
   * item with no embedding yet) scores similarity 0 instead of being dropped.
   */
  getCandidates(
    queryVector: number[] | null,
    projectScope: string | null,
    technologyScope: string[] | null,
    k: number
  ): CandidateMatch[] {
    if (k <= 0) return []
    if (projectScope !== null && !this.db.getProject(projectScope)) return []

    const items = this.db.queryContextItems({
      projectId: projectScope,
      technologies: technologyScope ? normalizeTags(technologyScope) : null
    })

    const scored = items.map(item => ({
      item,
      similarity: cosineSimilarity(queryVector, item.embedding)
    }))

    scored.sort((a, b) => {
      if (b.similarity !== a.similarity) return b.similarity - a.similarity
      return compareByRecency(a.item, b.item)
    })

    return scored.slice(0, k)
  }

  list(filter: ContextItemFilter): ContextItem[] {
    return this.db.queryContextItems(filter)
  }

  listByKind(kind: ContextKind, filter: Omit<ContextItemFilter, 'kinds'> = {}): ContextItem[] {
    return this.db.queryContextItems({ ...filter, kinds: [kind] })
  }

  count(): number {
    return this.db.countContextItems()
  }

  touch(id: string, at: Date = new Date()): void {
    if (!this.db.touchContextItem(id, at)) {
      throw new NotFoundError(id)
    }
  }

  recordOutcome(id: string, success: boolean): void {
    const delta = success ? this.outcomeStep : -this.outcomeStep
    if (!this.db.nudgeOutcomeScore(id, delta)) {
      throw new NotFoundError(id)
    }
  }

  setEmbedding(id: string, embedding: number[]): boolean {
    return this.db.setEmbeddingIfMissing(id, embedding)
  }

  listMissingEmbeddings(limit: number): ContextItem[] {
    return this.db.listContextItemsMissingEmbedding(limit)
  }

  /** Deletes items that are old, idle, rarely used and unsuccessful. All four must hold. */
  purge(policy: RetentionPolicy, now: Date = new Date()): number {
    const cutoffs: RetentionCutoffs = {
      createdBefore: new Date(now.getTime() - policy.maxAgeDays * MS_PER_DAY),
      lastAccessedBefore: new Date(now.getTime() - policy.idleDays * MS_PER_DAY),
      maxAccessCount: policy.maxAccessCount,
      maxOutcomeScore: policy.maxOutcomeScore
    }
    return this.db.deleteStaleContextItems(cutoffs)
  }
}
