import type { Confidence } from '../profile/confidence.js'

export const CONTEXT_KINDS = ['conversation', 'decision', 'code_pattern', 'anti_pattern'] as const

export type ContextKind = typeof CONTEXT_KINDS[number]

export interface Project {
  id: string
  name: string
  technologies: string[]
  createdAt: Date
}

export interface ContextItem {
  id: string
  projectId: string
  developerId: string
  kind: ContextKind
  technologyTags: string[]
  content: string
  contentHash: string
  embedding: number[] | null
  createdAt: Date
  lastAccessedAt: Date
  accessCount: number
  outcomeScore: number
  metadata: Record<string, unknown>
}

export interface CandidateMatch {
  item: ContextItem
  similarity: number
}

export interface RawObservation {
  kind: ContextKind
  content: string
  technologyTags: string[]
  observedAt?: Date
  metadata?: Record<string, unknown>
}

export interface AntiPatternEvidence {
  evidenceCount: number
  lastSeenAt: Date
}

export interface ProfileSnapshot {
  takenAt: Date
  updateCount: number
  technologyWeights: Record<string, number>
  topPatterns: { patternId: string; confidence: number }[]
  antiPatternCount: number
}

export interface DeveloperProfile {
  developerId: string
  technologyWeights: Map<string, Confidence>
  patternConfidence: Map<string, Confidence>
  antiPatterns: Map<string, AntiPatternEvidence>
  transferAdoption: Map<string, Confidence>
  evolutionLog: ProfileSnapshot[]
  updateCount: number
  lastSnapshotAt: Date | null
  updatedAt: Date | null
}

export interface PatternLink {
  id: string
  sourcePatternId: string
  targetItemId: string
  sourceTechnology: string | null
  targetTechnology: string
  adaptedContent: string
  similarity: number
  adaptationCost: number
  successProbability: number
  computedAt: Date
}

export interface AntiPatternWarning {
  matchedPatternId: string
  similarity: number
  suggestedAlternativePatternId: string | null
  subjectId: string | null
}

export function transferKey(sourceTechnology: string, targetTechnology: string): string {
  return `${sourceTechnology}->${targetTechnology}`
}

export function normalizeTags(tags: Iterable<string>): string[] {
  const set = new Set<string>()
  for (const tag of tags) {
    const t = tag.trim().toLowerCase()
    if (t) set.add(t)
  }
  return [...set].sort()
}
