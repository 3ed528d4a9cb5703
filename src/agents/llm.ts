import { ChatOpenAI } from '@langchain/openai';
import { CallbackHandler } from '@langfuse/langchain';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export const FALLBACK_MODEL = 'openai/gpt-4o-mini';

/**
 * Max tokens for a title plus a 4-5 sentence summary
 */
export const SUMMARY_MAX_TOKENS = 500;

const MODEL_ALIASES: Record<string, string> = {
  'chatgpt-5-mini': 'gpt-5-mini',
};

/**
 * Map a configured model name to an OpenRouter model id.
 * Names without a provider prefix are OpenAI models.
 */
export function resolveModelName(model: string): string {
  const trimmed = model.trim();
  const aliased = MODEL_ALIASES[trimmed] ?? trimmed;
  return aliased.includes('/') ? aliased : `openai/${aliased}`;
}

export interface LLMConfig {
  apiKey?: string;
  appUrl: string;
  timeoutMs: number;
}

/**
 * Create ChatOpenAI instance configured for OpenRouter.
 * Client-side retries are off: the summarizer falls back to another model instead.
 */
export function createOpenRouterLLM(model: string, config: LLMConfig): ChatOpenAI {
  return new ChatOpenAI({
    model: resolveModelName(model),
    apiKey: config.apiKey,
    configuration: {
      baseURL: OPENROUTER_BASE_URL,
      defaultHeaders: {
        'HTTP-Referer': config.appUrl,
        'X-Title': 'News Brief',
      },
    },
    temperature: 0.2,
    maxTokens: SUMMARY_MAX_TOKENS,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
}

/**
 * Langfuse callback handler for tracing summarization calls.
 * Credentials come from the span processor registered in instrumentation.ts.
 */
export function createLangfuseHandler(sessionId?: string): CallbackHandler {
  return new CallbackHandler({
    sessionId,
    tags: ['news-brief', 'ingestion'],
  });
}
