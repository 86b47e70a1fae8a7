import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../../storage/database.js'
import { VectorStore, type NewContextItem } from '../../context/vector-store.js'
import { ProfileStore } from '../../profile/profile-store.js'
import { LinkRecomputer, linkId } from '../link-recomputer.js'
import { cosineSimilarity } from '../../context/math.js'
import { unlinkSync, existsSync } from 'fs'

const TEST_DB = '/tmp/recollect-links-test.db'
const NOW = new Date('2026-01-01T00:00:00Z')

describe('LinkRecomputer', () => {
  let db: Database
  let store: VectorStore
  let profiles: ProfileStore
  let recomputer: LinkRecomputer

  const put = (overrides: Partial<NewContextItem>) => store.put({
    projectId: 'proj-a',
    developerId: 'dev-1',
    kind: 'code_pattern',
    content: 'content',
    technologyTags: [],
    embedding: [1, 0, 0],
    createdAt: NOW,
    ...overrides
  })

  beforeEach(() => {
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
    db = new Database(TEST_DB)
    db.insertProject({ id: 'proj-a', name: 'A', technologies: [], createdAt: NOW })
    store = new VectorStore(db, { outcomeStep: 0.05 })
    profiles = new ProfileStore(db, {
      step: 0.1,
      antiPatternThreshold: 0.35,
      snapshotEveryUpdates: 50,
      snapshotIntervalDays: 7,
      evolutionLogLimit: 52,
      now: () => NOW
    })
    recomputer = new LinkRecomputer(db, profiles, {
      similarityThreshold: 0.55,
      globalPrior: 0.5,
      transferableKinds: ['code_pattern', 'decision'],
      now: () => NOW
    })
  })

  afterEach(() => {
    db.close()
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
  })

  it('links similar patterns across technologies with the global prior', async () => {
    const react = put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    const vue = put({ content: 'vue composable', technologyTags: ['vue'], embedding: [0.9, 0.1, 0] })
    const similarity = cosineSimilarity([1, 0, 0], [0.9, 0.1, 0])

    const result = await recomputer.recompute()
    expect(result.status).toBe('completed')
    expect(result.linkCount).toBe(2)

    const [link] = db.getPatternLinks(react.id, 'vue')
    expect(link.id).toBe(linkId(react.id, vue.id, 'vue'))
    expect(link.id).toBe(`${react.id}->${vue.id}@vue`)
    expect(link.sourceTechnology).toBe('react')
    expect(link.adaptedContent).toBe('vue composable')
    expect(link.similarity).toBeCloseTo(similarity)
    expect(link.adaptationCost).toBeCloseTo(1 - similarity)
    expect(link.successProbability).toBeCloseTo(similarity * 0.5)
    expect(link.computedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z')

    expect(db.getPatternLinks(vue.id, 'react')).toHaveLength(1)
  })

  it('uses the developer adoption rate once one is recorded', async () => {
    const react = put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    put({ content: 'vue composable', technologyTags: ['vue'], embedding: [1, 0, 0] })
    profiles.updateOnTransferOutcome('dev-1', 'react', 'vue', true)

    await recomputer.recompute()
    const [link] = db.getPatternLinks(react.id, 'vue')
    expect(link.successProbability).toBeCloseTo(0.55)
  })

  it('skips pairs below the similarity threshold, of different kinds, or without embeddings', async () => {
    put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    put({ content: 'svelte store', technologyTags: ['svelte'], embedding: [0, 1, 0] })
    put({ content: 'vue decision', kind: 'decision', technologyTags: ['vue'], embedding: [1, 0, 0] })
    put({ content: 'angular chat', kind: 'conversation', technologyTags: ['angular'], embedding: [1, 0, 0] })
    put({ content: 'solid pending', technologyTags: ['solid'], embedding: null })

    const result = await recomputer.recompute()
    expect(result.linkCount).toBe(0)
    expect(result.patternCount).toBe(3)
  })

  it('only links technologies the source does not already use', async () => {
    const react = put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    const both = put({ content: 'react and vue', technologyTags: ['react', 'vue'], embedding: [1, 0, 0] })

    await recomputer.recompute()
    expect(db.getPatternLinks(react.id).map(l => l.id)).toEqual([linkId(react.id, both.id, 'vue')])
    expect(db.getPatternLinks(both.id)).toEqual([])
  })

  it('replaces the previous link set', async () => {
    const react = put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    put({ content: 'vue composable', technologyTags: ['vue'], embedding: [1, 0, 0] })
    await recomputer.recompute()
    expect(db.countPatternLinks()).toBe(2)

    put({ content: 'svelte store', technologyTags: ['svelte'], embedding: [1, 0, 0] })
    await recomputer.recompute()
    expect(db.countPatternLinks()).toBe(6)
    expect(db.getPatternLinks(react.id).map(l => l.targetTechnology).sort()).toEqual(['svelte', 'vue'])
  })

  it('writes nothing when aborted', async () => {
    put({ content: 'react hook', technologyTags: ['react'], embedding: [1, 0, 0] })
    put({ content: 'vue composable', technologyTags: ['vue'], embedding: [1, 0, 0] })
    await recomputer.recompute()

    put({ content: 'svelte store', technologyTags: ['svelte'], embedding: [1, 0, 0] })
    const controller = new AbortController()
    controller.abort()
    const result = await recomputer.recompute(controller.signal)

    expect(result.status).toBe('aborted')
    expect(db.countPatternLinks()).toBe(2)
  })

  it('yields between batches and still completes', async () => {
    const batched = new LinkRecomputer(db, profiles, {
      similarityThreshold: 0.55,
      globalPrior: 0.5,
      transferableKinds: ['code_pattern'],
      batchSize: 1,
      now: () => NOW
    })
    put({ content: 'react hook', technologyTags: ['react'] })
    put({ content: 'vue composable', technologyTags: ['vue'] })
    put({ content: 'svelte store', technologyTags: ['svelte'] })

    const result = await batched.recompute()
    expect(result.status).toBe('completed')
    expect(result.linkCount).toBe(6)
  })
})
