export { ContextEngine } from './engine.js'
export type {
  ContextEngineParams,
  StoreRequest,
  RetrieveRequest,
  RetrievalResult,
  IngestResult,
  EngineStats
} from './engine.js'
export { EngineLifecycle } from './lifecycle.js'
export type { WakeOptions } from './lifecycle.js'
export { Database } from '../storage/database.js'
export { VectorStore } from '../context/vector-store.js'
export { ProfileStore } from '../profile/profile-store.js'
export { Confidence } from '../profile/confidence.js'
export { Ranker } from '../ranking/ranker.js'
export type { ScoredItem, ProjectContext } from '../ranking/ranker.js'
export { PatternTransferEngine } from '../transfer/transfer-engine.js'
export { LinkRecomputer } from '../transfer/link-recomputer.js'
export { fitToBudget, applySummaries } from '../budget/budgeter.js'
export type { BudgetUnit, FittedContext, FittedItem, Summarizer } from '../budget/budgeter.js'
export { JsonlObservationExtractor } from '../ingest/extractor.js'
export type { RawSourceExtractor } from '../ingest/extractor.js'
export { loadConfig, saveConfig, validateConfig, DEFAULT_CONFIG } from '../config.js'
export type { RecollectConfig } from '../config.js'
export * from '../context/types.js'
export * from '../errors.js'
