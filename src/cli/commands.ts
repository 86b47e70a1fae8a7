import { existsSync, readFileSync } from 'node:fs'
import { EngineLifecycle } from '../engine/lifecycle.js'
import type { ContextEngine } from '../engine/engine.js'
import { JsonlObservationExtractor } from '../ingest/extractor.js'
import { CONTEXT_KINDS, type ContextKind } from '../context/types.js'
import type { BudgetUnit } from '../budget/budgeter.js'
import { loadConfig, saveConfig, resolveDbPath } from '../config.js'
import { isEngineError } from '../errors.js'

const BUDGET_UNITS: readonly BudgetUnit[] = ['tokens', 'characters', 'items']

function splitList(value?: string): string[] {
  if (!value) return []
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0)
}

function parseKind(value: string): ContextKind | null {
  return CONTEXT_KINDS.find(k => k === value) ?? null
}

function parseUnit(value: string): BudgetUnit | null {
  return BUDGET_UNITS.find(u => u === value) ?? null
}

function parseCount(name: string, value: string): number | null {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 0) {
    console.log(`Invalid ${name}: ${value}`)
    return null
  }
  return n
}

/**
 * Opens the engine for one command and closes it afterwards. Commands that
 * embed text need a provider key; the rest only touch the database.
 */
async function withEngine(
  fn: (engine: ContextEngine) => Promise<void> | void,
  options: { needsEmbeddings?: boolean; needsDatabase?: boolean } = {}
): Promise<void> {
  if (options.needsDatabase) {
    const dbPath = resolveDbPath(loadConfig().storage.dbPath)
    if (dbPath !== ':memory:' && !existsSync(dbPath)) {
      console.log('No database found. Run \'recollect project add\' first to initialize.')
      return
    }
  }

  const lifecycle = new EngineLifecycle()
  try {
    await lifecycle.wake({ requireApiKeys: options.needsEmbeddings ?? false, quiet: true })
  } catch (e) {
    const errorMessage = e instanceof Error ? e.message : 'Unknown error'
    console.error(errorMessage)
    process.exitCode = 1
    return
  }

  try {
    await fn(lifecycle.engine)
  } catch (e) {
    if (!isEngineError(e)) throw e
    console.error(`Error (${e.code}): ${e.message}`)
    process.exitCode = 1
  } finally {
    await lifecycle.sleep()
  }
}

// --- Projects ---

export async function projectAddCommand(
  id: string,
  options: { name?: string; tech?: string }
): Promise<void> {
  await withEngine(engine => {
    const project = engine.createProject({
      id,
      name: options.name ?? id,
      technologies: splitList(options.tech)
    })
    console.log(`Project ${project.id} (${project.name})`)
    console.log(`  Technologies: ${project.technologies.join(', ') || '(none)'}`)
  })
}

export async function projectListCommand(): Promise<void> {
  await withEngine(engine => {
    const projects = engine.listProjects()
    if (projects.length === 0) {
      console.log('No projects yet.')
      return
    }
    for (const project of projects) {
      console.log(`  ${project.id.padEnd(20)} ${project.name}  [${project.technologies.join(', ')}]`)
    }
  }, { needsDatabase: true })
}

// --- Context ---

export async function storeCommand(options: {
  project: string
  dev: string
  kind: string
  tech?: string
  content?: string
  file?: string
}): Promise<void> {
  const kind = parseKind(options.kind)
  if (!kind) {
    console.log(`Unknown kind: ${options.kind}. Expected one of: ${CONTEXT_KINDS.join(', ')}`)
    process.exitCode = 1
    return
  }

  let content = options.content
  if (options.file) {
    if (!existsSync(options.file)) {
      console.log(`File not found: ${options.file}`)
      process.exitCode = 1
      return
    }
    content = readFileSync(options.file, 'utf-8')
  }
  if (!content) {
    console.log('Nothing to store. Pass --content or --file.')
    process.exitCode = 1
    return
  }
  const text = content

  await withEngine(async engine => {
    const id = await engine.store({
      projectId: options.project,
      developerId: options.dev,
      kind,
      content: text,
      technologyTags: splitList(options.tech)
    })
    console.log(id)
  }, { needsEmbeddings: true })
}

export async function retrieveCommand(query: string, options: {
  project: string
  dev: string
  k: string
  budget: string
  unit?: string
  tech?: string
  crossProject?: boolean
  compress?: boolean
  json?: boolean
}): Promise<void> {
  const k = parseCount('k', options.k)
  const budgetUnits = parseCount('budget', options.budget)
  if (k === null || budgetUnits === null) {
    process.exitCode = 1
    return
  }

  let unit: BudgetUnit | undefined
  if (options.unit) {
    const parsed = parseUnit(options.unit)
    if (!parsed) {
      console.log(`Unknown unit: ${options.unit}. Expected one of: ${BUDGET_UNITS.join(', ')}`)
      process.exitCode = 1
      return
    }
    unit = parsed
  }

  await withEngine(async engine => {
    const result = await engine.retrieve({
      queryText: query,
      developerId: options.dev,
      projectId: options.project,
      technologyScope: options.tech ? splitList(options.tech) : null,
      crossProject: options.crossProject,
      k,
      budgetUnits,
      unit,
      compress: options.compress
    })

    if (options.json) {
      console.log(JSON.stringify({
        degraded: result.degraded,
        unit: result.unit,
        maxUnits: result.maxUnits,
        usedUnits: result.usedUnits,
        items: result.items.map(i => ({
          id: i.item.id,
          kind: i.item.kind,
          score: i.score,
          units: i.units,
          isSummary: i.isSummary,
          content: i.content
        })),
        warnings: result.warnings,
        substitutes: result.substitutes.map(l => ({ id: l.id, targetItemId: l.targetItemId, successProbability: l.successProbability }))
      }, null, 2))
      return
    }

    if (result.degraded) {
      console.log('  (degraded: query could not be embedded, semantic similarity skipped)')
    }
    if (result.items.length === 0) {
      console.log('No context fits.')
      return
    }

    console.log(`\n  ${result.items.length} item(s), ${result.usedUnits}/${result.maxUnits} ${result.unit}:\n`)
    for (const fitted of result.items) {
      const marker = fitted.isSummary ? ' (compressed)' : ''
      console.log(`  [${fitted.item.id}] ${fitted.item.kind}  score ${fitted.score.toFixed(3)}${marker}`)
      console.log(`    ${fitted.content.split('\n').join('\n    ')}`)
      console.log('')
    }

    for (const warning of result.warnings) {
      const about = warning.subjectId ? `item ${warning.subjectId}` : 'query'
      const alt = warning.suggestedAlternativePatternId ? `, try ${warning.suggestedAlternativePatternId}` : ''
      console.log(`  ! ${about} resembles anti-pattern ${warning.matchedPatternId} (${warning.similarity.toFixed(3)})${alt}`)
    }
    for (const link of result.substitutes) {
      console.log(`  -> ${link.sourcePatternId} has a ${link.targetTechnology} counterpart ${link.targetItemId} (p=${link.successProbability.toFixed(3)}, link ${link.id})`)
    }
  }, { needsEmbeddings: true })
}

export async function outcomeCommand(id: string, result: string): Promise<void> {
  if (result !== 'success' && result !== 'failure') {
    console.log('Usage: recollect outcome <id> success|failure')
    process.exitCode = 1
    return
  }

  await withEngine(engine => {
    engine.reportOutcome(id, result === 'success')
    console.log(`Recorded ${result} for ${id}`)
  }, { needsDatabase: true })
}

// --- Profile & transfer ---

export async function profileCommand(developerId: string, options: { history?: string }): Promise<void> {
  await withEngine(engine => {
    if (options.history) {
      const history = engine.getProfileHistory(developerId, options.history)
      if (history.length === 0) {
        console.log('No snapshots recorded yet.')
        return
      }
      for (const point of history) {
        console.log(`  ${point.takenAt.toISOString()}  ${point.weight.toFixed(3)}`)
      }
      return
    }

    const profile = engine.getProfileSummary(developerId)
    const weights = [...profile.technologyWeights.entries()].sort((a, b) => b[1].value - a[1].value)

    console.log('')
    console.log(`  Developer Profile: ${profile.developerId}`)
    console.log('  ' + '-'.repeat(40))
    console.log(`  Updates:        ${profile.updateCount}`)
    console.log(`  Last update:    ${profile.updatedAt?.toISOString() ?? 'never'}`)
    console.log(`  Patterns:       ${profile.patternConfidence.size}`)
    console.log(`  Anti-patterns:  ${profile.antiPatterns.size}`)
    console.log(`  Snapshots:      ${profile.evolutionLog.length}`)

    if (weights.length > 0) {
      console.log('\n  Technologies:')
      for (const [tech, weight] of weights) {
        console.log(`    ${tech.padEnd(20)} ${weight.value.toFixed(3)}`)
      }
    }

    if (profile.transferAdoption.size > 0) {
      console.log('\n  Transfer adoption:')
      for (const [pair, rate] of profile.transferAdoption) {
        console.log(`    ${pair.padEnd(28)} ${rate.value.toFixed(3)}`)
      }
    }
    console.log('')
  }, { needsDatabase: true })
}

export async function transfersCommand(patternId: string, technology: string): Promise<void> {
  await withEngine(engine => {
    const links = engine.findTransfers(patternId, technology)
    if (links.length === 0) {
      console.log('No transfer candidates. Links are refreshed by \'recollect maintain\'.')
      return
    }
    for (const link of links) {
      console.log(`  [${link.id}]`)
      console.log(`    Target:       ${link.targetItemId}`)
      console.log(`    Similarity:   ${link.similarity.toFixed(3)}`)
      console.log(`    Success p:    ${link.successProbability.toFixed(3)}`)
      console.log(`    Adapt cost:   ${link.adaptationCost.toFixed(3)}`)
      console.log('')
    }
  }, { needsDatabase: true })
}

// --- Maintenance ---

export async function ingestCommand(projectPath: string, options: { project: string; dev: string }): Promise<void> {
  const extractor = new JsonlObservationExtractor()
  await withEngine(async engine => {
    await engine.ingest(extractor, projectPath, options.project, options.dev)
    for (const issue of extractor.issues) {
      console.log(`  line ${issue.line}: ${issue.message}`)
    }
  }, { needsEmbeddings: true })
}

export async function maintainCommand(): Promise<void> {
  const lifecycle = new EngineLifecycle()
  await lifecycle.wake({ requireApiKeys: true })
  try {
    await lifecycle.runMaintenance()
  } finally {
    await lifecycle.sleep()
  }
}

/** Keeps the engine open and runs maintenance on the configured interval until interrupted. */
export async function serveCommand(): Promise<void> {
  const lifecycle = new EngineLifecycle()
  await lifecycle.wake({ requireApiKeys: true, schedule: true })
  console.log(`Maintenance every ${lifecycle.config.transfer.recomputeIntervalMinutes} minutes (Ctrl+C to stop)`)

  await new Promise<void>(resolve => {
    process.once('SIGINT', () => resolve())
    process.once('SIGTERM', () => resolve())
  })

  await lifecycle.sleep()
  console.log('Stopped.')
}

export async function purgeCommand(): Promise<void> {
  await withEngine(engine => {
    const removed = engine.purge()
    console.log(`Removed ${removed} stale item(s).`)
  }, { needsDatabase: true })
}

export async function statsCommand(): Promise<void> {
  await withEngine(engine => {
    const stats = engine.stats()
    console.log('')
    console.log('  Context Store')
    console.log('  -------------')
    console.log(`  Projects:            ${stats.projects}`)
    console.log(`  Context items:       ${stats.totalItems}`)
    for (const kind of CONTEXT_KINDS) {
      console.log(`  ${(kind + ':').padEnd(21)}${stats.items[kind]}`)
    }
    console.log(`  Awaiting embedding:  ${stats.missingEmbeddings}`)
    console.log(`  Pattern links:       ${stats.patternLinks}`)
    console.log(`  Links computed:      ${stats.lastLinkComputation?.toISOString() ?? 'never'}`)
    console.log(`  Retrievals:          ${stats.retrievals.total} (${stats.retrievals.degraded} degraded)`)
    console.log('')
  }, { needsDatabase: true })
}

export async function configCommand(action?: string, key?: string, value?: string): Promise<void> {
  if (!action) {
    const config = loadConfig()
    console.log(JSON.stringify(config, null, 2))
    return
  }

  if (action === 'set' && key && value) {
    // Dot notation into a nested partial
    const parts = key.split('.')
    const obj: Record<string, unknown> = {}
    let current: Record<string, unknown> = obj
    for (const part of parts.slice(0, -1)) {
      const next: Record<string, unknown> = {}
      current[part] = next
      current = next
    }
    // Numbers and booleans come through as JSON
    let parsed: unknown
    try {
      parsed = JSON.parse(value)
    } catch {
      parsed = value
    }
    current[parts[parts.length - 1]] = parsed
    saveConfig(obj)
    console.log(`Set ${key} = ${value}`)
    return
  }

  console.log('Usage: recollect config [set <key> <value>]')
}
