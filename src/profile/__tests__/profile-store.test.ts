import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Database } from '../../storage/database.js'
import { ProfileStore, type ProfileStoreOptions } from '../profile-store.js'
import { unlinkSync, existsSync } from 'fs'

const TEST_DB = '/tmp/recollect-profile-test.db'
const DAY = 24 * 60 * 60 * 1000

const DEFAULTS: ProfileStoreOptions = {
  step: 0.1,
  antiPatternThreshold: 0.35,
  snapshotEveryUpdates: 50,
  snapshotIntervalDays: 7,
  evolutionLogLimit: 52
}

describe('ProfileStore', () => {
  let db: Database
  let clock: Date

  const makeStore = (overrides: Partial<ProfileStoreOptions> = {}) =>
    new ProfileStore(db, { ...DEFAULTS, now: () => clock, ...overrides })

  beforeEach(() => {
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
    db = new Database(TEST_DB)
    clock = new Date('2026-01-01T00:00:00Z')
  })

  afterEach(() => {
    db.close()
    if (existsSync(TEST_DB)) unlinkSync(TEST_DB)
  })

  it('returns an empty profile for an unknown developer', () => {
    const profile = makeStore().getProfile('dev-1')
    expect(profile.technologyWeights.size).toBe(0)
    expect(profile.updateCount).toBe(0)
    expect(profile.updatedAt).toBeNull()
  })

  describe('updateOnObservation', () => {
    it('moves toward 1 by step * |delta|', () => {
      const profile = makeStore().updateOnObservation('dev-1', 'react', 0.5)
      expect(profile.technologyWeights.get('react')?.value).toBeCloseTo(0.525)
      expect(profile.updateCount).toBe(1)
    })

    it('moves toward 0 for a negative delta', () => {
      const profile = makeStore().updateOnObservation('dev-1', 'react', -1)
      expect(profile.technologyWeights.get('react')?.value).toBeCloseTo(0.45)
    })

    it('ignores a zero delta', () => {
      const store = makeStore()
      store.updateOnObservation('dev-1', 'react', 0)
      expect(store.getProfile('dev-1').updateCount).toBe(0)
    })

    it('persists between store instances', () => {
      makeStore().updateOnObservation('dev-1', 'react', 1)
      expect(makeStore().getProfile('dev-1').technologyWeights.get('react')?.value).toBeCloseTo(0.55)
    })
  })

  describe('updateOnOutcome', () => {
    it('converges by the EMA rule on repeated success', () => {
      const store = makeStore()
      for (let i = 0; i < 5; i++) {
        store.updateOnOutcome('dev-1', { patternId: 'p1', success: true, technologies: ['react'] })
      }

      const profile = store.getProfile('dev-1')
      // 1 - 0.5 * 0.9^5
      expect(profile.patternConfidence.get('p1')?.value).toBeCloseTo(0.704755, 6)
      expect(profile.technologyWeights.get('react')?.value).toBeCloseTo(0.704755, 6)
    })

    it('stays bounded and monotone under long runs', () => {
      const store = makeStore()
      let previous = 0.5
      for (let i = 0; i < 100; i++) {
        const profile = store.updateOnOutcome('dev-1', { patternId: 'p1', success: true, technologies: [] })
        const value = profile.patternConfidence.get('p1')?.value ?? 0
        expect(value).toBeGreaterThanOrEqual(previous)
        expect(value).toBeLessThanOrEqual(1)
        previous = value
      }
    })

    it('records anti-pattern evidence once confidence falls below the threshold', () => {
      const store = makeStore()
      const fail = () => store.updateOnOutcome('dev-1', { patternId: 'p1', success: false, technologies: [] })

      // 0.45, 0.405, 0.3645
      fail(); fail(); fail()
      expect(store.getProfile('dev-1').antiPatterns.has('p1')).toBe(false)

      // 0.32805
      fail()
      expect(store.getProfile('dev-1').antiPatterns.get('p1')?.evidenceCount).toBe(1)
    })

    it('counts a failed known anti-pattern as evidence immediately', () => {
      const profile = makeStore().updateOnOutcome('dev-1', {
        patternId: 'ap1',
        success: false,
        technologies: [],
        knownAntiPattern: true
      })
      expect(profile.antiPatterns.get('ap1')?.evidenceCount).toBe(1)
    })
  })

  it('flagAntiPattern accumulates evidence', () => {
    const store = makeStore()
    store.flagAntiPattern('dev-1', 'ap1')
    const profile = store.flagAntiPattern('dev-1', 'ap1')
    expect(profile.antiPatterns.get('ap1')?.evidenceCount).toBe(2)
    expect(profile.antiPatterns.get('ap1')?.lastSeenAt.toISOString()).toBe('2026-01-01T00:00:00.000Z')
  })

  it('tracks transfer adoption per technology pair', () => {
    const store = makeStore()
    expect(store.getTransferAdoption('dev-1', 'react', 'vue')).toBeNull()

    store.updateOnTransferOutcome('dev-1', 'react', 'vue', true)
    expect(store.getTransferAdoption('dev-1', 'react', 'vue')).toBeCloseTo(0.55)
    expect(store.getTransferAdoption('dev-1', 'vue', 'react')).toBeNull()
  })

  it('sees writes made through another connection', () => {
    const other = new Database(TEST_DB)
    try {
      const a = makeStore()
      const b = new ProfileStore(other, { ...DEFAULTS, now: () => clock })

      a.updateOnObservation('dev-1', 'react', 1)
      b.updateOnObservation('dev-1', 'python', 1)
      a.updateOnObservation('dev-1', 'react', 1)

      const profile = a.getProfile('dev-1')
      expect(profile.updateCount).toBe(3)
      expect(profile.technologyWeights.get('python')?.value).toBeCloseTo(0.55)
      expect(profile.technologyWeights.get('react')?.value).toBeCloseTo(0.595)
    } finally {
      other.close()
    }
  })

  describe('snapshots', () => {
    it('takes a snapshot every N updates', () => {
      const store = makeStore()
      for (let i = 0; i < 49; i++) store.updateOnObservation('dev-1', 'react', 1)
      expect(store.getProfile('dev-1').evolutionLog).toHaveLength(0)

      store.updateOnObservation('dev-1', 'react', 1)
      const profile = store.getProfile('dev-1')
      expect(profile.evolutionLog).toHaveLength(1)
      expect(profile.evolutionLog[0].updateCount).toBe(50)
      expect(profile.lastSnapshotAt?.toISOString()).toBe('2026-01-01T00:00:00.000Z')
    })

    it('takes a snapshot once the interval has passed since the last one', () => {
      const store = makeStore({ snapshotEveryUpdates: 3 })
      for (let i = 0; i < 3; i++) store.updateOnObservation('dev-1', 'react', 1)
      expect(store.getProfile('dev-1').evolutionLog).toHaveLength(1)

      clock = new Date(clock.getTime() + 6 * DAY)
      store.updateOnObservation('dev-1', 'react', 1)
      expect(store.getProfile('dev-1').evolutionLog).toHaveLength(1)

      clock = new Date(clock.getTime() + 1 * DAY)
      store.updateOnObservation('dev-1', 'react', 1)
      const log = store.getProfile('dev-1').evolutionLog
      expect(log).toHaveLength(2)
      expect(log[1].updateCount).toBe(5)
    })

    it('keeps only the newest snapshots', () => {
      const store = makeStore({ snapshotEveryUpdates: 1, evolutionLogLimit: 3 })
      for (let i = 0; i < 5; i++) store.updateOnObservation('dev-1', 'react', 1)

      expect(store.getProfile('dev-1').evolutionLog.map(s => s.updateCount)).toEqual([3, 4, 5])
    })

    it('records top patterns by confidence', () => {
      const store = makeStore({ snapshotEveryUpdates: 2 })
      store.updateOnOutcome('dev-1', { patternId: 'low', success: false, technologies: [] })
      store.updateOnOutcome('dev-1', { patternId: 'high', success: true, technologies: [] })

      const [snapshot] = store.getProfile('dev-1').evolutionLog
      expect(snapshot.topPatterns.map(p => p.patternId)).toEqual(['high', 'low'])
    })

    it('reports the weight history of one technology', () => {
      const store = makeStore({ snapshotEveryUpdates: 1 })
      store.updateOnObservation('dev-1', 'react', 1)
      clock = new Date('2026-01-02T00:00:00Z')
      store.updateOnObservation('dev-1', 'python', 1)

      const history = store.getHistory('dev-1', 'python')
      expect(history).toHaveLength(2)
      expect(history[0].weight).toBe(0.5)
      expect(history[1].weight).toBeCloseTo(0.55)
      expect(history[1].takenAt.toISOString()).toBe('2026-01-02T00:00:00.000Z')
    })

    it('reads technologies named like object members as unweighted', () => {
      const store = makeStore({ snapshotEveryUpdates: 1 })
      store.updateOnObservation('dev-1', 'react', 1)

      expect(store.getHistory('dev-1', 'constructor').map(h => h.weight)).toEqual([0.5])
      expect(store.getHistory('dev-1', 'toString').map(h => h.weight)).toEqual([0.5])
    })
  })
})
