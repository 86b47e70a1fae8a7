import BetterSqlite3 from 'better-sqlite3'
import type {
  Project,
  ContextItem,
  ContextKind,
  DeveloperProfile,
  AntiPatternEvidence,
  ProfileSnapshot,
  PatternLink
} from '../context/types.js'
import { CONTEXT_KINDS } from '../context/types.js'
import { Confidence } from '../profile/confidence.js'

interface ProjectRow {
  id: string
  name: string
  technologies: string
  created_at: string
}

interface ContextItemRow {
  id: string
  project_id: string
  developer_id: string
  kind: string
  technology_tags: string
  content: string
  content_hash: string
  embedding: string | null
  created_at: string
  last_accessed_at: string
  access_count: number
  outcome_score: number
  metadata: string
}

interface ProfileRow {
  developer_id: string
  technology_weights: string
  pattern_confidence: string
  anti_patterns: string
  transfer_adoption: string
  evolution_log: string
  update_count: number
  last_snapshot_at: string | null
  updated_at: string | null
}

interface PatternLinkRow {
  id: string
  source_pattern_id: string
  target_item_id: string
  source_technology: string | null
  target_technology: string
  adapted_content: string
  similarity: number
  adaptation_cost: number
  success_probability: number
  computed_at: string
}

export interface ContextItemFilter {
  projectId?: string | null
  developerId?: string
  technologies?: string[] | null
  kinds?: ContextKind[]
  embeddedOnly?: boolean
}

export interface RetentionCutoffs {
  createdBefore: Date
  lastAccessedBefore: Date
  maxAccessCount: number
  maxOutcomeScore: number
}

export interface RetrievalLogEntry {
  timestamp: Date
  developerId: string
  projectId: string
  query: string
  resultCount: number
  degraded: boolean
}

function parseJsonObject(raw: string | null): Record<string, unknown> {
  if (!raw) return {}
  const parsed: unknown = JSON.parse(raw)
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {}
}

function parseStringArray(raw: string | null): string[] {
  if (!raw) return []
  const parsed: unknown = JSON.parse(raw)
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : []
}

function parseEmbedding(raw: string | null): number[] | null {
  if (!raw) return null
  const parsed: unknown = JSON.parse(raw)
  if (!Array.isArray(parsed)) return null
  return parsed.filter((v): v is number => typeof v === 'number')
}

function parseConfidenceMap(raw: string): Map<string, Confidence> {
  const map = new Map<string, Confidence>()
  for (const [key, value] of Object.entries(parseJsonObject(raw))) {
    if (typeof value === 'number') map.set(key, Confidence.of(value))
  }
  return map
}

function serializeConfidenceMap(map: ReadonlyMap<string, Confidence>): string {
  return JSON.stringify(Object.fromEntries([...map].map(([key, c]): [string, number] => [key, c.value])))
}

function isContextKind(value: string): value is ContextKind {
  return (CONTEXT_KINDS as readonly string[]).includes(value)
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('foreign_keys = ON')
    this.db.pragma('busy_timeout = 5000')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        technologies JSON NOT NULL,
        created_at DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS context_items (
        id TEXT PRIMARY KEY,
        project_id TEXT NOT NULL REFERENCES projects(id),
        developer_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        technology_tags JSON NOT NULL,
        content TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        embedding BLOB,
        created_at DATETIME NOT NULL,
        last_accessed_at DATETIME NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        outcome_score REAL NOT NULL DEFAULT 0.5,
        metadata JSON,
        UNIQUE (project_id, content_hash)
      );

      CREATE INDEX IF NOT EXISTS idx_context_items_project ON context_items(project_id);
      CREATE INDEX IF NOT EXISTS idx_context_items_kind ON context_items(kind);

      CREATE TABLE IF NOT EXISTS context_item_tags (
        item_id TEXT NOT NULL REFERENCES context_items(id) ON DELETE CASCADE,
        tag TEXT NOT NULL,
        PRIMARY KEY (item_id, tag)
      );

      CREATE INDEX IF NOT EXISTS idx_context_item_tags_tag ON context_item_tags(tag);

      CREATE TABLE IF NOT EXISTS developer_profiles (
        developer_id TEXT PRIMARY KEY,
        technology_weights JSON NOT NULL,
        pattern_confidence JSON NOT NULL,
        anti_patterns JSON NOT NULL,
        transfer_adoption JSON NOT NULL,
        evolution_log JSON NOT NULL,
        update_count INTEGER NOT NULL DEFAULT 0,
        last_snapshot_at DATETIME,
        updated_at DATETIME
      );

      CREATE TABLE IF NOT EXISTS pattern_links (
        id TEXT PRIMARY KEY,
        source_pattern_id TEXT NOT NULL REFERENCES context_items(id) ON DELETE CASCADE,
        target_item_id TEXT NOT NULL REFERENCES context_items(id) ON DELETE CASCADE,
        source_technology TEXT,
        target_technology TEXT NOT NULL,
        adapted_content TEXT NOT NULL,
        similarity REAL NOT NULL,
        adaptation_cost REAL NOT NULL,
        success_probability REAL NOT NULL,
        computed_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pattern_links_source ON pattern_links(source_pattern_id, target_technology);

      CREATE TABLE IF NOT EXISTS retrieval_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp DATETIME NOT NULL,
        developer_id TEXT NOT NULL,
        project_id TEXT NOT NULL,
        query TEXT NOT NULL,
        result_count INTEGER NOT NULL,
        degraded BOOLEAN NOT NULL
      );
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all() as { name: string }[]
    return rows.map(r => r.name)
  }

  /** Runs `fn` inside `BEGIN IMMEDIATE`, so concurrent writers on other connections wait for it. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate()
  }

  // --- Projects ---

  insertProject(project: Project): boolean {
    const result = this.db.prepare(`
      INSERT INTO projects (id, name, technologies, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO NOTHING
    `).run(
      project.id,
      project.name,
      JSON.stringify(project.technologies),
      project.createdAt.toISOString()
    )
    return result.changes > 0
  }

  getProject(id: string): Project | null {
    const row = this.db.prepare('SELECT * FROM projects WHERE id = ?').get(id) as ProjectRow | undefined
    if (!row) return null
    return this.deserializeProject(row)
  }

  listProjects(): Project[] {
    const rows = this.db.prepare('SELECT * FROM projects ORDER BY created_at, id').all() as ProjectRow[]
    return rows.map(row => this.deserializeProject(row))
  }

  private deserializeProject(row: ProjectRow): Project {
    return {
      id: row.id,
      name: row.name,
      technologies: parseStringArray(row.technologies),
      createdAt: new Date(row.created_at)
    }
  }

  // --- Context Items ---

  insertContextItem(item: ContextItem): void {
    this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO context_items (id, project_id, developer_id, kind, technology_tags, content, content_hash, embedding, created_at, last_accessed_at, access_count, outcome_score, metadata)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        item.id,
        item.projectId,
        item.developerId,
        item.kind,
        JSON.stringify(item.technologyTags),
        item.content,
        item.contentHash,
        item.embedding ? JSON.stringify(item.embedding) : null,
        item.createdAt.toISOString(),
        item.lastAccessedAt.toISOString(),
        item.accessCount,
        item.outcomeScore,
        JSON.stringify(item.metadata)
      )

      const insertTag = this.db.prepare('INSERT INTO context_item_tags (item_id, tag) VALUES (?, ?)')
      for (const tag of item.technologyTags) {
        insertTag.run(item.id, tag)
      }
    })()
  }

  getContextItem(id: string): ContextItem | null {
    const row = this.db.prepare('SELECT * FROM context_items WHERE id = ?').get(id) as ContextItemRow | undefined
    if (!row) return null
    return this.deserializeContextItem(row)
  }

  findContextItemIdByHash(projectId: string, contentHash: string): string | null {
    const row = this.db.prepare(
      'SELECT id FROM context_items WHERE project_id = ? AND content_hash = ?'
    ).get(projectId, contentHash) as { id: string } | undefined
    return row?.id ?? null
  }

  queryContextItems(filter: ContextItemFilter): ContextItem[] {
    const clauses: string[] = []
    const params: unknown[] = []

    if (filter.projectId) {
      clauses.push('project_id = ?')
      params.push(filter.projectId)
    }
    if (filter.developerId) {
      clauses.push('developer_id = ?')
      params.push(filter.developerId)
    }
    if (filter.technologies && filter.technologies.length > 0) {
      clauses.push(`id IN (SELECT item_id FROM context_item_tags WHERE tag IN (${filter.technologies.map(() => '?').join(', ')}))`)
      params.push(...filter.technologies)
    }
    if (filter.kinds && filter.kinds.length > 0) {
      clauses.push(`kind IN (${filter.kinds.map(() => '?').join(', ')})`)
      params.push(...filter.kinds)
    }
    if (filter.embeddedOnly) {
      clauses.push('embedding IS NOT NULL')
    }

    let sql = 'SELECT * FROM context_items'
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`
    }
    sql += ' ORDER BY created_at DESC, id ASC'

    const rows = this.db.prepare(sql).all(...params) as ContextItemRow[]
    return rows.map(row => this.deserializeContextItem(row))
  }

  touchContextItem(id: string, at: Date): boolean {
    const result = this.db.prepare(
      'UPDATE context_items SET last_accessed_at = ?, access_count = access_count + 1 WHERE id = ?'
    ).run(at.toISOString(), id)
    return result.changes > 0
  }

  nudgeOutcomeScore(id: string, delta: number): boolean {
    const result = this.db.prepare(
      'UPDATE context_items SET outcome_score = MIN(1.0, MAX(0.0, outcome_score + ?)) WHERE id = ?'
    ).run(delta, id)
    return result.changes > 0
  }

  setEmbeddingIfMissing(id: string, embedding: number[]): boolean {
    const result = this.db.prepare(
      'UPDATE context_items SET embedding = ? WHERE id = ? AND embedding IS NULL'
    ).run(JSON.stringify(embedding), id)
    return result.changes > 0
  }

  listContextItemsMissingEmbedding(limit: number): ContextItem[] {
    const rows = this.db.prepare(
      'SELECT * FROM context_items WHERE embedding IS NULL ORDER BY created_at ASC, id ASC LIMIT ?'
    ).all(limit) as ContextItemRow[]
    return rows.map(row => this.deserializeContextItem(row))
  }

  deleteStaleContextItems(cutoffs: RetentionCutoffs): number {
    const result = this.db.prepare(`
      DELETE FROM context_items
      WHERE created_at < ?
        AND last_accessed_at < ?
        AND access_count <= ?
        AND outcome_score <= ?
    `).run(
      cutoffs.createdBefore.toISOString(),
      cutoffs.lastAccessedBefore.toISOString(),
      cutoffs.maxAccessCount,
      cutoffs.maxOutcomeScore
    )
    return result.changes
  }

  countContextItemsByKind(): Record<ContextKind, number> {
    const counts: Record<ContextKind, number> = {
      conversation: 0,
      decision: 0,
      code_pattern: 0,
      anti_pattern: 0
    }
    const rows = this.db.prepare(
      'SELECT kind, COUNT(*) AS n FROM context_items GROUP BY kind'
    ).all() as { kind: string; n: number }[]
    for (const row of rows) {
      if (isContextKind(row.kind)) counts[row.kind] = row.n
    }
    return counts
  }

  countContextItems(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM context_items').get() as { n: number }
    return row.n
  }

  countContextItemsMissingEmbedding(): number {
    const row = this.db.prepare(
      'SELECT COUNT(*) AS n FROM context_items WHERE embedding IS NULL'
    ).get() as { n: number }
    return row.n
  }

  private deserializeContextItem(row: ContextItemRow): ContextItem {
    if (!isContextKind(row.kind)) {
      throw new Error(`Corrupt context item ${row.id}: unknown kind ${row.kind}`)
    }
    return {
      id: row.id,
      projectId: row.project_id,
      developerId: row.developer_id,
      kind: row.kind,
      technologyTags: parseStringArray(row.technology_tags),
      content: row.content,
      contentHash: row.content_hash,
      embedding: parseEmbedding(row.embedding),
      createdAt: new Date(row.created_at),
      lastAccessedAt: new Date(row.last_accessed_at),
      accessCount: row.access_count,
      outcomeScore: row.outcome_score,
      metadata: parseJsonObject(row.metadata)
    }
  }

  // --- Developer Profiles ---

  loadProfile(developerId: string): DeveloperProfile | null {
    const row = this.db.prepare(
      'SELECT * FROM developer_profiles WHERE developer_id = ?'
    ).get(developerId) as ProfileRow | undefined
    if (!row) return null

    const antiPatterns = new Map<string, AntiPatternEvidence>()
    for (const [patternId, value] of Object.entries(parseJsonObject(row.anti_patterns))) {
      if (typeof value !== 'object' || value === null) continue
      const entry = Object.fromEntries(Object.entries(value))
      antiPatterns.set(patternId, {
        evidenceCount: typeof entry.evidenceCount === 'number' ? entry.evidenceCount : 0,
        lastSeenAt: new Date(typeof entry.lastSeenAt === 'string' ? entry.lastSeenAt : 0)
      })
    }

    const evolutionRaw: unknown = JSON.parse(row.evolution_log)
    const evolutionLog: ProfileSnapshot[] = Array.isArray(evolutionRaw)
      ? evolutionRaw.map(s => this.deserializeSnapshot(s))
      : []

    return {
      developerId: row.developer_id,
      technologyWeights: parseConfidenceMap(row.technology_weights),
      patternConfidence: parseConfidenceMap(row.pattern_confidence),
      antiPatterns,
      transferAdoption: parseConfidenceMap(row.transfer_adoption),
      evolutionLog,
      updateCount: row.update_count,
      lastSnapshotAt: row.last_snapshot_at ? new Date(row.last_snapshot_at) : null,
      updatedAt: row.updated_at ? new Date(row.updated_at) : null
    }
  }

  saveProfile(profile: DeveloperProfile): void {
    const antiPatterns: Record<string, { evidenceCount: number; lastSeenAt: string }> = {}
    for (const [patternId, evidence] of profile.antiPatterns) {
      antiPatterns[patternId] = {
        evidenceCount: evidence.evidenceCount,
        lastSeenAt: evidence.lastSeenAt.toISOString()
      }
    }

    this.db.prepare(`
      INSERT INTO developer_profiles (developer_id, technology_weights, pattern_confidence, anti_patterns, transfer_adoption, evolution_log, update_count, last_snapshot_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(developer_id) DO UPDATE SET
        technology_weights = excluded.technology_weights,
        pattern_confidence = excluded.pattern_confidence,
        anti_patterns = excluded.anti_patterns,
        transfer_adoption = excluded.transfer_adoption,
        evolution_log = excluded.evolution_log,
        update_count = excluded.update_count,
        last_snapshot_at = excluded.last_snapshot_at,
        updated_at = excluded.updated_at
    `).run(
      profile.developerId,
      serializeConfidenceMap(profile.technologyWeights),
      serializeConfidenceMap(profile.patternConfidence),
      JSON.stringify(antiPatterns),
      serializeConfidenceMap(profile.transferAdoption),
      JSON.stringify(profile.evolutionLog.map(s => ({ ...s, takenAt: s.takenAt.toISOString() }))),
      profile.updateCount,
      profile.lastSnapshotAt ? profile.lastSnapshotAt.toISOString() : null,
      profile.updatedAt ? profile.updatedAt.toISOString() : null
    )
  }

  private deserializeSnapshot(raw: unknown): ProfileSnapshot {
    const s = typeof raw === 'object' && raw !== null ? Object.fromEntries(Object.entries(raw)) : {}

    const technologyWeights: Record<string, number> = typeof s.technologyWeights === 'object' && s.technologyWeights !== null
      ? Object.fromEntries(Object.entries(s.technologyWeights).filter((entry): entry is [string, number] => typeof entry[1] === 'number'))
      : {}

    const topPatterns: ProfileSnapshot['topPatterns'] = []
    if (Array.isArray(s.topPatterns)) {
      for (const p of s.topPatterns) {
        if (typeof p !== 'object' || p === null) continue
        const entry = Object.fromEntries(Object.entries(p))
        if (typeof entry.patternId === 'string' && typeof entry.confidence === 'number') {
          topPatterns.push({ patternId: entry.patternId, confidence: entry.confidence })
        }
      }
    }

    return {
      takenAt: new Date(typeof s.takenAt === 'string' ? s.takenAt : 0),
      updateCount: typeof s.updateCount === 'number' ? s.updateCount : 0,
      technologyWeights,
      topPatterns,
      antiPatternCount: typeof s.antiPatternCount === 'number' ? s.antiPatternCount : 0
    }
  }

  // --- Pattern Links ---

  replacePatternLinks(links: PatternLink[]): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM pattern_links').run()
      const insert = this.db.prepare(`
        INSERT INTO pattern_links (id, source_pattern_id, target_item_id, source_technology, target_technology, adapted_content, similarity, adaptation_cost, success_probability, computed_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      for (const link of links) {
        insert.run(
          link.id,
          link.sourcePatternId,
          link.targetItemId,
          link.sourceTechnology,
          link.targetTechnology,
          link.adaptedContent,
          link.similarity,
          link.adaptationCost,
          link.successProbability,
          link.computedAt.toISOString()
        )
      }
    })
  }

  getPatternLink(id: string): PatternLink | null {
    const row = this.db.prepare('SELECT * FROM pattern_links WHERE id = ?').get(id) as PatternLinkRow | undefined
    if (!row) return null
    return this.deserializePatternLink(row)
  }

  getPatternLinks(sourcePatternId: string, targetTechnology?: string): PatternLink[] {
    let sql = 'SELECT * FROM pattern_links WHERE source_pattern_id = ?'
    const params: unknown[] = [sourcePatternId]
    if (targetTechnology) {
      sql += ' AND target_technology = ?'
      params.push(targetTechnology)
    }
    sql += ' ORDER BY success_probability DESC, similarity DESC, id ASC'

    const rows = this.db.prepare(sql).all(...params) as PatternLinkRow[]
    return rows.map(row => this.deserializePatternLink(row))
  }

  countPatternLinks(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM pattern_links').get() as { n: number }
    return row.n
  }

  lastLinkComputation(): Date | null {
    const row = this.db.prepare('SELECT MAX(computed_at) AS at FROM pattern_links').get() as { at: string | null }
    return row.at ? new Date(row.at) : null
  }

  private deserializePatternLink(row: PatternLinkRow): PatternLink {
    return {
      id: row.id,
      sourcePatternId: row.source_pattern_id,
      targetItemId: row.target_item_id,
      sourceTechnology: row.source_technology,
      targetTechnology: row.target_technology,
      adaptedContent: row.adapted_content,
      similarity: row.similarity,
      adaptationCost: row.adaptation_cost,
      successProbability: row.success_probability,
      computedAt: new Date(row.computed_at)
    }
  }

  // --- Retrieval Log ---

  logRetrieval(entry: RetrievalLogEntry): void {
    this.db.prepare(`
      INSERT INTO retrieval_log (timestamp, developer_id, project_id, query, result_count, degraded)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      entry.timestamp.toISOString(),
      entry.developerId,
      entry.projectId,
      entry.query,
      entry.resultCount,
      entry.degraded ? 1 : 0
    )
  }

  countRetrievals(): { total: number; degraded: number } {
    const row = this.db.prepare(
      'SELECT COUNT(*) AS total, COALESCE(SUM(degraded), 0) AS degraded FROM retrieval_log'
    ).get() as { total: number; degraded: number }
    return row
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
