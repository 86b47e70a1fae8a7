import { Database } from '../storage/database.js'
import { Confidence, confidenceOrNeutral } from './confidence.js'
import { transferKey } from '../context/types.js'
import type { DeveloperProfile, ProfileSnapshot } from '../context/types.js'

export interface ProfileStoreOptions {
  step: number
  antiPatternThreshold: number
  snapshotEveryUpdates: number
  snapshotIntervalDays: number
  evolutionLogLimit: number
  now?: () => Date
}

export interface OutcomeUpdate {
  patternId: string
  success: boolean
  technologies: string[]
  /** The pattern is itself a stored anti-pattern, so a failure is always evidence. */
  knownAntiPattern?: boolean
}

const MS_PER_DAY = 24 * 60 * 60 * 1000
const SNAPSHOT_TOP_PATTERNS = 10

export function emptyProfile(developerId: string): DeveloperProfile {
  return {
    developerId,
    technologyWeights: new Map(),
    patternConfidence: new Map(),
    antiPatterns: new Map(),
    transferAdoption: new Map(),
    evolutionLog: [],
    updateCount: 0,
    lastSnapshotAt: null,
    updatedAt: null
  }
}

export function cloneProfile(profile: DeveloperProfile): DeveloperProfile {
  return {
    ...profile,
    technologyWeights: new Map(profile.technologyWeights),
    patternConfidence: new Map(profile.patternConfidence),
    antiPatterns: new Map([...profile.antiPatterns].map(([id, e]) => [id, { ...e }])),
    transferAdoption: new Map(profile.transferAdoption),
    evolutionLog: profile.evolutionLog.map(s => ({
      ...s,
      technologyWeights: { ...s.technologyWeights },
      topPatterns: s.topPatterns.map(p => ({ ...p }))
    }))
  }
}

export class ProfileStore {
  private db: Database
  private options: ProfileStoreOptions
  private now: () => Date

  constructor(db: Database, options: ProfileStoreOptions) {
    this.db = db
    this.options = options
    this.now = options.now ?? (() => new Date())
  }

  getProfile(developerId: string): DeveloperProfile {
    return this.db.loadProfile(developerId) ?? emptyProfile(developerId)
  }

  /**
   * Moves the developer's weight for `technology` toward 1 (positive delta)
   * or 0 (negative delta) by `step * |delta|`.
   */
  updateOnObservation(developerId: string, technology: string, delta: number): DeveloperProfile {
    const magnitude = Math.min(1, Math.abs(delta))
    if (!Number.isFinite(delta) || magnitude === 0) {
      return this.getProfile(developerId)
    }
    const target = delta > 0 ? 1 : 0

    return this.mutate(developerId, profile => {
      const current = confidenceOrNeutral(profile.technologyWeights, technology)
      profile.technologyWeights.set(technology, current.toward(target, this.options.step * magnitude))
    })
  }

  updateOnOutcome(developerId: string, update: OutcomeUpdate): DeveloperProfile {
    const target = update.success ? 1 : 0

    return this.mutate(developerId, (profile, now) => {
      const pattern = confidenceOrNeutral(profile.patternConfidence, update.patternId)
        .toward(target, this.options.step)
      profile.patternConfidence.set(update.patternId, pattern)

      for (const tech of update.technologies) {
        const weight = confidenceOrNeutral(profile.technologyWeights, tech)
        profile.technologyWeights.set(tech, weight.toward(target, this.options.step))
      }

      if (!update.success && (update.knownAntiPattern || pattern.value < this.options.antiPatternThreshold)) {
        addEvidence(profile, update.patternId, now)
      }
    })
  }

  flagAntiPattern(developerId: string, patternId: string): DeveloperProfile {
    return this.mutate(developerId, (profile, now) => {
      addEvidence(profile, patternId, now)
    })
  }

  updateOnTransferOutcome(
    developerId: string,
    sourceTechnology: string,
    targetTechnology: string,
    success: boolean
  ): DeveloperProfile {
    const key = transferKey(sourceTechnology, targetTechnology)
    return this.mutate(developerId, profile => {
      const rate = confidenceOrNeutral(profile.transferAdoption, key)
      profile.transferAdoption.set(key, rate.toward(success ? 1 : 0, this.options.step))
    })
  }

  getTransferAdoption(developerId: string, sourceTechnology: string, targetTechnology: string): number | null {
    const profile = this.db.loadProfile(developerId)
    return profile?.transferAdoption.get(transferKey(sourceTechnology, targetTechnology))?.value ?? null
  }

  getHistory(developerId: string, technology: string): { takenAt: Date; weight: number }[] {
    const profile = this.getProfile(developerId)
    return profile.evolutionLog.map(s => ({
      takenAt: s.takenAt,
      weight: Object.hasOwn(s.technologyWeights, technology) ? s.technologyWeights[technology] : 0.5
    }))
  }

  // Read-modify-write under an immediate transaction: one writer per profile at a time
  private mutate(developerId: string, apply: (profile: DeveloperProfile, now: Date) => void): DeveloperProfile {
    return this.db.transaction(() => {
      const profile = this.db.loadProfile(developerId) ?? emptyProfile(developerId)
      const now = this.now()

      apply(profile, now)
      profile.updateCount += 1
      profile.updatedAt = now
      this.maybeSnapshot(profile, now)

      this.db.saveProfile(profile)
      return profile
    })
  }

  private maybeSnapshot(profile: DeveloperProfile, now: Date): void {
    const dueByCount = profile.updateCount % this.options.snapshotEveryUpdates === 0
    const dueByTime = profile.lastSnapshotAt !== null &&
      now.getTime() - profile.lastSnapshotAt.getTime() >= this.options.snapshotIntervalDays * MS_PER_DAY
    if (!dueByCount && !dueByTime) return

    profile.evolutionLog.push(takeSnapshot(profile, now))
    profile.lastSnapshotAt = now

    const overflow = profile.evolutionLog.length - this.options.evolutionLogLimit
    if (overflow > 0) {
      profile.evolutionLog.splice(0, overflow)
    }
  }
}

function addEvidence(profile: DeveloperProfile, patternId: string, now: Date): void {
  const existing = profile.antiPatterns.get(patternId)
  profile.antiPatterns.set(patternId, {
    evidenceCount: (existing?.evidenceCount ?? 0) + 1,
    lastSeenAt: now
  })
}

function takeSnapshot(profile: DeveloperProfile, now: Date): ProfileSnapshot {
  const technologyWeights: Record<string, number> = Object.fromEntries(
    [...profile.technologyWeights].map(([tech, weight]): [string, number] => [tech, weight.value])
  )

  const topPatterns = [...profile.patternConfidence]
    .map(([patternId, c]) => ({ patternId, confidence: c.value }))
    .sort((a, b) => b.confidence - a.confidence || (a.patternId < b.patternId ? -1 : 1))
    .slice(0, SNAPSHOT_TOP_PATTERNS)

  return {
    takenAt: now,
    updateCount: profile.updateCount,
    technologyWeights,
    topPatterns,
    antiPatternCount: profile.antiPatterns.size
  }
}
