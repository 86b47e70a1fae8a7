import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import type { RecollectConfig } from '../config.js'
import type { BudgetUnit, Summarizer } from '../budget/budgeter.js'

const DEFAULT_BASE_URLS: Record<RecollectConfig['summarizer']['provider'], string> = {
  openai: 'https://api.openai.com/v1',
  cerebras: 'https://api.cerebras.ai/v1',
  ollama: 'http://localhost:11434/v1',
  openrouter: 'https://openrouter.ai/api/v1'
}

export function createLLMProvider(config: RecollectConfig['summarizer']) {
  // All supported providers speak the OpenAI chat format
  const openai = createOpenAI({
    apiKey: config.apiKey ?? (config.provider === 'ollama' ? 'ollama' : undefined),
    baseURL: config.baseUrl || DEFAULT_BASE_URLS[config.provider],
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI itself serves
  return (modelId: string) => openai.chat(modelId)
}

export function buildSummaryPrompt(content: string, allowance: number, unit: BudgetUnit): string {
  const limit = unit === 'tokens'
    ? `${allowance} tokens`
    : unit === 'characters'
      ? `${allowance} characters`
      : 'one short paragraph'

  return [
    'Condense the following piece of a developer\'s project history so it can be reused as context for a coding assistant.',
    'Keep identifiers, API names, decisions and their reasons. Drop pleasantries and repetition.',
    `Reply with the condensed text only, at most ${limit}.`,
    '',
    '---',
    content
  ].join('\n')
}

export function createSummarizer(config: RecollectConfig['summarizer']): Summarizer {
  const provider = createLLMProvider(config)
  const model = provider(config.model)

  return {
    async summarize(content: string, allowance: number, unit: BudgetUnit): Promise<string> {
      const maxOutputTokens = unit === 'tokens'
        ? Math.min(config.maxOutputTokens, allowance)
        : config.maxOutputTokens
      const { text } = await generateText({
        model,
        prompt: buildSummaryPrompt(content, allowance, unit),
        maxOutputTokens
      })
      return text
    }
  }
}
