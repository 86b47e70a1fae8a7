export type EngineErrorCode =
  | 'not_found'
  | 'duplicate_content'
  | 'invalid_scope'
  | 'embedding_unavailable'
  | 'invalid_input'

export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EngineError'
    this.code = code
  }
}

export class NotFoundError extends EngineError {
  readonly id: string

  constructor(id: string, what: string = 'item') {
    super('not_found', `Unknown ${what}: ${id}`)
    this.name = 'NotFoundError'
    this.id = id
  }
}

export class DuplicateContentError extends EngineError {
  readonly existingId: string
  readonly projectId: string

  constructor(existingId: string, projectId: string) {
    super('duplicate_content', `Identical content already stored in project ${projectId} as ${existingId}`)
    this.name = 'DuplicateContentError'
    this.existingId = existingId
    this.projectId = projectId
  }
}

export class InvalidScopeError extends EngineError {
  readonly projectId: string

  constructor(projectId: string) {
    super('invalid_scope', `Project does not exist: ${projectId}`)
    this.name = 'InvalidScopeError'
    this.projectId = projectId
  }
}

export class EmbeddingUnavailableError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('embedding_unavailable', message, { cause })
    this.name = 'EmbeddingUnavailableError'
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string) {
    super('invalid_input', message)
    this.name = 'InvalidInputError'
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError
}
