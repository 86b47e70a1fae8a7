import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../database.js'
import { Confidence } from '../../profile/confidence.js'
import { emptyProfile } from '../../profile/profile-store.js'
import type { ContextItem, PatternLink } from '../../context/types.js'
import { unlinkSync, existsSync } from 'fs'

const TEST_DB = '/tmp/recollect-database-test.db'

function makeItem(overrides: Partial<ContextItem> = {}): ContextItem {
  return {
    id: 'item-1',
    projectId: 'proj-a',
    developerId: 'dev-1',
    kind: 'code_pattern',
    technologyTags: ['typescript'],
    content: 'const x = 1',
    contentHash: 'hash-1',
    embedding: [0.1, 0.2, 0.3],
    createdAt: new Date('2026-01-01T00:00:00Z'),
    lastAccessedAt: new Date('2026-01-01T00:00:00Z'),
    accessCount: 0,
    outcomeScore: 0.5,
    metadata: { source: 'test' },
    ...overrides
  }
}

function makeLink(overrides: Partial<PatternLink> = {}): PatternLink {
  return {
    id: 'item-1->item-2@python',
    sourcePatternId: 'item-1',
    targetItemId: 'item-2',
    sourceTechnology: 'typescript',
    targetTechnology: 'python',
    adaptedContent: 'x = 1',
    similarity: 0.9,
    adaptationCost: 0.1,
    successProbability: 0.45,
    computedAt: new Date('2026-02-01T00:00:00Z'),
    ...overrides
  }
}

describe('Database', () => {
  let db: Database

  beforeEach(() => {
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
    db = new Database(TEST_DB)
    db.insertProject({ id: 'proj-a', name: 'A', technologies: ['typescript'], createdAt: new Date('2026-01-01T00:00:00Z') })
  })

  afterEach(() => {
    db.close()
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
  })

  it('creates tables on init', () => {
    const tables = db.listTables()
    expect(tables).toContain('projects')
    expect(tables).toContain('context_items')
    expect(tables).toContain('context_item_tags')
    expect(tables).toContain('developer_profiles')
    expect(tables).toContain('pattern_links')
    expect(tables).toContain('retrieval_log')
  })

  it('inserts a project once', () => {
    const again = db.insertProject({ id: 'proj-a', name: 'Other', technologies: [], createdAt: new Date() })
    expect(again).toBe(false)
    expect(db.getProject('proj-a')?.name).toBe('A')
    expect(db.getProject('proj-a')?.technologies).toEqual(['typescript'])
    expect(db.getProject('missing')).toBeNull()
  })

  it('round-trips a context item', () => {
    db.insertContextItem(makeItem())

    const result = db.getContextItem('item-1')
    expect(result).not.toBeNull()
    expect(result?.content).toBe('const x = 1')
    expect(result?.embedding).toEqual([0.1, 0.2, 0.3])
    expect(result?.technologyTags).toEqual(['typescript'])
    expect(result?.metadata).toEqual({ source: 'test' })
    expect(result?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z')
  })

  it('stores a missing embedding as null', () => {
    db.insertContextItem(makeItem({ embedding: null }))
    expect(db.getContextItem('item-1')?.embedding).toBeNull()
    expect(db.countContextItemsMissingEmbedding()).toBe(1)

    expect(db.setEmbeddingIfMissing('item-1', [1, 0])).toBe(true)
    expect(db.setEmbeddingIfMissing('item-1', [0, 1])).toBe(false)
    expect(db.getContextItem('item-1')?.embedding).toEqual([1, 0])
  })

  it('rejects the same content hash twice in one project', () => {
    db.insertContextItem(makeItem())
    expect(() => db.insertContextItem(makeItem({ id: 'item-2' }))).toThrow()
    expect(db.findContextItemIdByHash('proj-a', 'hash-1')).toBe('item-1')
  })

  it('filters items by technology tag and kind', () => {
    db.insertContextItem(makeItem({ id: 'ts', contentHash: 'h1', technologyTags: ['typescript'] }))
    db.insertContextItem(makeItem({ id: 'py', contentHash: 'h2', technologyTags: ['python'], kind: 'decision' }))

    expect(db.queryContextItems({ technologies: ['python'] }).map(i => i.id)).toEqual(['py'])
    expect(db.queryContextItems({ kinds: ['code_pattern'] }).map(i => i.id)).toEqual(['ts'])
    expect(db.queryContextItems({}).map(i => i.id)).toEqual(['py', 'ts'])
  })

  it('orders items newest first, then by id', () => {
    db.insertContextItem(makeItem({ id: 'b', contentHash: 'h1' }))
    db.insertContextItem(makeItem({ id: 'a', contentHash: 'h2' }))
    db.insertContextItem(makeItem({ id: 'c', contentHash: 'h3', createdAt: new Date('2026-03-01T00:00:00Z') }))

    expect(db.queryContextItems({ projectId: 'proj-a' }).map(i => i.id)).toEqual(['c', 'a', 'b'])
  })

  it('clamps outcome score nudges to [0, 1]', () => {
    db.insertContextItem(makeItem({ outcomeScore: 0.98 }))
    db.nudgeOutcomeScore('item-1', 0.05)
    expect(db.getContextItem('item-1')?.outcomeScore).toBe(1)

    expect(db.nudgeOutcomeScore('missing', 0.05)).toBe(false)
  })

  it('deletes stale items only when every cutoff holds', () => {
    const old = new Date('2025-01-01T00:00:00Z')
    db.insertContextItem(makeItem({ id: 'stale', contentHash: 'h1', createdAt: old, lastAccessedAt: old, outcomeScore: 0.2 }))
    db.insertContextItem(makeItem({ id: 'liked', contentHash: 'h2', createdAt: old, lastAccessedAt: old, outcomeScore: 0.8 }))

    const removed = db.deleteStaleContextItems({
      createdBefore: new Date('2025-06-01T00:00:00Z'),
      lastAccessedBefore: new Date('2025-06-01T00:00:00Z'),
      maxAccessCount: 1,
      maxOutcomeScore: 0.3
    })

    expect(removed).toBe(1)
    expect(db.getContextItem('stale')).toBeNull()
    expect(db.getContextItem('liked')).not.toBeNull()
  })

  it('round-trips a developer profile', () => {
    const profile = emptyProfile('dev-1')
    profile.technologyWeights.set('typescript', Confidence.of(0.7))
    profile.patternConfidence.set('item-1', Confidence.of(0.9))
    profile.transferAdoption.set('typescript->python', Confidence.of(0.6))
    profile.antiPatterns.set('item-9', { evidenceCount: 2, lastSeenAt: new Date('2026-01-02T00:00:00Z') })
    profile.evolutionLog.push({
      takenAt: new Date('2026-01-03T00:00:00Z'),
      updateCount: 50,
      technologyWeights: { typescript: 0.7 },
      topPatterns: [{ patternId: 'item-1', confidence: 0.9 }],
      antiPatternCount: 1
    })
    profile.updateCount = 50
    profile.lastSnapshotAt = new Date('2026-01-03T00:00:00Z')
    db.saveProfile(profile)

    const loaded = db.loadProfile('dev-1')
    expect(loaded?.technologyWeights.get('typescript')?.value).toBe(0.7)
    expect(loaded?.patternConfidence.get('item-1')?.value).toBe(0.9)
    expect(loaded?.transferAdoption.get('typescript->python')?.value).toBe(0.6)
    expect(loaded?.antiPatterns.get('item-9')?.evidenceCount).toBe(2)
    expect(loaded?.evolutionLog).toHaveLength(1)
    expect(loaded?.evolutionLog[0].topPatterns).toEqual([{ patternId: 'item-1', confidence: 0.9 }])
    expect(loaded?.updateCount).toBe(50)
    expect(loaded?.lastSnapshotAt?.toISOString()).toBe('2026-01-03T00:00:00.000Z')
    expect(db.loadProfile('nobody')).toBeNull()
  })

  it('keeps a technology named __proto__ through a profile round trip', () => {
    const profile = emptyProfile('dev-1')
    profile.technologyWeights.set('__proto__', Confidence.of(0.8))
    profile.evolutionLog.push({
      takenAt: new Date('2026-01-03T00:00:00Z'),
      updateCount: 1,
      technologyWeights: Object.fromEntries([['__proto__', 0.8]]),
      topPatterns: [],
      antiPatternCount: 0
    })
    db.saveProfile(profile)

    const loaded = db.loadProfile('dev-1')
    expect(loaded?.technologyWeights.get('__proto__')?.value).toBe(0.8)
    expect(Object.entries(loaded?.evolutionLog[0].technologyWeights ?? {})).toEqual([['__proto__', 0.8]])
  })

  it('replaces the whole pattern link set', () => {
    db.insertContextItem(makeItem({ id: 'item-1', contentHash: 'h1' }))
    db.insertContextItem(makeItem({ id: 'item-2', contentHash: 'h2', technologyTags: ['python'] }))
    db.insertContextItem(makeItem({ id: 'item-3', contentHash: 'h3', technologyTags: ['python'] }))

    db.replacePatternLinks([
      makeLink(),
      makeLink({ id: 'item-1->item-3@python', targetItemId: 'item-3', successProbability: 0.6 })
    ])
    expect(db.getPatternLinks('item-1', 'python').map(l => l.id)).toEqual([
      'item-1->item-3@python',
      'item-1->item-2@python'
    ])

    db.replacePatternLinks([makeLink()])
    expect(db.countPatternLinks()).toBe(1)
    expect(db.getPatternLink('item-1->item-3@python')).toBeNull()
    expect(db.lastLinkComputation()?.toISOString()).toBe('2026-02-01T00:00:00.000Z')
  })

  it('drops links when their item is deleted', () => {
    const old = new Date('2025-01-01T00:00:00Z')
    db.insertContextItem(makeItem({ id: 'item-1', contentHash: 'h1', createdAt: old, lastAccessedAt: old, outcomeScore: 0 }))
    db.insertContextItem(makeItem({ id: 'item-2', contentHash: 'h2' }))
    db.replacePatternLinks([makeLink()])

    db.deleteStaleContextItems({
      createdBefore: new Date('2025-06-01T00:00:00Z'),
      lastAccessedBefore: new Date('2025-06-01T00:00:00Z'),
      maxAccessCount: 1,
      maxOutcomeScore: 0.3
    })

    expect(db.countPatternLinks()).toBe(0)
  })

  it('counts retrievals and degraded retrievals', () => {
    const base = { timestamp: new Date(), developerId: 'dev-1', projectId: 'proj-a', query: 'q', resultCount: 0 }
    db.logRetrieval({ ...base, degraded: false })
    db.logRetrieval({ ...base, degraded: true })

    expect(db.countRetrievals()).toEqual({ total: 2, degraded: 1 })
  })
})
