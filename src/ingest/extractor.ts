import { readFileSync, existsSync, statSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { CONTEXT_KINDS } from '../context/types.js'
import type { RawObservation } from '../context/types.js'

export interface RawSourceExtractor {
  extractObservations(projectPath: string): Promise<RawObservation[]>
}

export const OBSERVATIONS_FILE = '.recollect/observations.jsonl'

const observationSchema = z.object({
  kind: z.enum(CONTEXT_KINDS),
  content: z.string().min(1),
  technologyTags: z.array(z.string()).default([]),
  observedAt: z.string().datetime({ offset: true }).optional(),
  metadata: z.record(z.unknown()).optional()
})

export interface ExtractionIssue {
  line: number
  message: string
}

/**
 * Reads one observation per line from `<project>/.recollect/observations.jsonl`
 * (or from the path itself when it names a file). Lines that fail validation
 * are reported through `issues` and skipped.
 */
export class JsonlObservationExtractor implements RawSourceExtractor {
  readonly issues: ExtractionIssue[] = []

  async extractObservations(projectPath: string): Promise<RawObservation[]> {
    this.issues.length = 0

    const filePath = existsSync(projectPath) && statSync(projectPath).isFile()
      ? projectPath
      : path.join(projectPath, OBSERVATIONS_FILE)
    if (!existsSync(filePath)) return []

    const observations: RawObservation[] = []
    const lines = readFileSync(filePath, 'utf-8').split('\n')

    lines.forEach((line, index) => {
      if (line.trim() === '') return

      let json: unknown
      try {
        json = JSON.parse(line)
      } catch {
        this.issues.push({ line: index + 1, message: 'Invalid JSON' })
        return
      }

      const parsed = observationSchema.safeParse(json)
      if (!parsed.success) {
        this.issues.push({
          line: index + 1,
          message: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        })
        return
      }

      const { observedAt, ...rest } = parsed.data
      observations.push({
        ...rest,
        observedAt: observedAt ? new Date(observedAt) : undefined
      })
    })

    return observations
  }
}
