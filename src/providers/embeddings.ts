import { createVoyage } from 'voyage-ai-provider'
import { createOpenAI } from '@ai-sdk/openai'
import { embed } from 'ai'
import type { RecollectConfig } from '../config.js'
import { EmbeddingUnavailableError } from '../errors.js'

export type EmbedFn = (text: string) => Promise<number[]>

function createEmbeddingModel(config: RecollectConfig['embedding']) {
  if (config.provider === 'openai') {
    const openai = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl
    })
    return openai.textEmbeddingModel(config.model)
  }

  const voyage = createVoyage({
    apiKey: config.apiKey,
    baseURL: config.baseUrl
  })
  return voyage.textEmbeddingModel(config.model)
}

/**
 * Embedding collaborator bound to the configured provider. Every failure,
 * including a timeout, surfaces as EmbeddingUnavailableError.
 */
export function createEmbedFn(config: RecollectConfig['embedding']): EmbedFn {
  const model = createEmbeddingModel(config)

  return async (text: string): Promise<number[]> => {
    try {
      const result = await embed({
        model,
        value: text,
        maxRetries: 1,
        abortSignal: AbortSignal.timeout(config.timeoutMs)
      })
      return result.embedding
    } catch (e) {
      throw new EmbeddingUnavailableError(`${config.provider} embedding failed for model ${config.model}`, e)
    }
  }
}
