import type { ScoredItem } from '../ranking/ranker.js'

export type BudgetUnit = 'tokens' | 'characters' | 'items'

export interface BudgetOptions {
  unit: BudgetUnit
  compress?: boolean
  charsPerToken?: number
  minCompressedUnits?: number
}

export interface FittedItem extends ScoredItem {
  content: string
  units: number
  isSummary: boolean
}

export interface FittedContext {
  items: FittedItem[]
  unit: BudgetUnit
  maxUnits: number
  usedUnits: number
  dropped: string[]
}

export interface Summarizer {
  summarize(content: string, allowance: number, unit: BudgetUnit): Promise<string>
}

const DEFAULT_CHARS_PER_TOKEN = 4
const DEFAULT_MIN_COMPRESSED_UNITS = 16

export function measure(content: string, unit: BudgetUnit, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
  switch (unit) {
    case 'items':
      return 1
    case 'characters':
      return content.length
    case 'tokens':
      return Math.ceil(content.length / charsPerToken)
  }
}

export function truncateToUnits(content: string, allowance: number, unit: BudgetUnit, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): string {
  if (unit === 'items') return content
  const maxChars = unit === 'tokens' ? Math.floor(allowance * charsPerToken) : Math.floor(allowance)
  if (content.length <= maxChars) return content
  if (maxChars <= 3) return content.slice(0, pairSafeCut(content, Math.max(0, maxChars)))
  return content.slice(0, pairSafeCut(content, maxChars - 3)) + '...'
}

// Never leave half of a surrogate pair at the end of a cut
function pairSafeCut(content: string, end: number): number {
  if (end <= 0) return 0
  const last = content.charCodeAt(end - 1)
  return last >= 0xd800 && last <= 0xdbff ? end - 1 : end
}

/**
 * Greedy highest-score-first packing. An item that does not fit is skipped
 * and the next one tried; with `compress` it is instead cut down to the
 * remaining allowance and marked `isSummary`.
 */
export function fitToBudget(scoredItems: ScoredItem[], maxUnits: number, options: BudgetOptions): FittedContext {
  const unit = options.unit
  const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN
  const minCompressed = Math.max(1, options.minCompressedUnits ?? DEFAULT_MIN_COMPRESSED_UNITS)
  const canCompress = options.compress === true && unit !== 'items'
  const budget = Math.max(0, Math.floor(maxUnits))

  const ordered = [...scoredItems].sort((a, b) => b.score - a.score)

  const items: FittedItem[] = []
  const dropped: string[] = []
  let used = 0

  for (const scored of ordered) {
    const content = scored.item.content
    const units = measure(content, unit, charsPerToken)
    const remaining = budget - used

    if (units <= remaining) {
      items.push({ ...scored, content, units, isSummary: false })
      used += units
      continue
    }

    if (canCompress && remaining >= minCompressed) {
      const standIn = truncateToUnits(content, remaining, unit, charsPerToken)
      const standInUnits = measure(standIn, unit, charsPerToken)
      if (standInUnits <= remaining) {
        items.push({ ...scored, content: standIn, units: standInUnits, isSummary: true })
        used += standInUnits
        continue
      }
    }

    dropped.push(scored.item.id)
  }

  return { items, unit, maxUnits: budget, usedUnits: used, dropped }
}

/**
 * Replaces the truncated stand-ins with summaries from an external summarizer.
 * A summary that fails, comes back empty or would not fit keeps the truncation.
 */
export async function applySummaries(
  fitted: FittedContext,
  summarizer: Summarizer,
  options: { charsPerToken?: number } = {}
): Promise<FittedContext> {
  const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN
  const items: FittedItem[] = []
  let used = 0

  for (const item of fitted.items) {
    if (!item.isSummary) {
      items.push(item)
      used += item.units
      continue
    }

    const allowance = item.units
    let replacement = item
    try {
      const summary = (await summarizer.summarize(item.item.content, allowance, fitted.unit)).trim()
      const units = measure(summary, fitted.unit, charsPerToken)
      if (summary && units <= allowance) {
        replacement = { ...item, content: summary, units }
      }
    } catch (e) {
      console.error(`[budget] Summarizer failed for ${item.item.id}, keeping truncation:`, e)
    }
    items.push(replacement)
    used += replacement.units
  }

  return { ...fitted, items, usedUnits: used }
}
