import { ChatPromptTemplate } from '@langchain/core/prompts';
import { RunnableSequence } from '@langchain/core/runnables';
import type { CallbackHandler } from '@langfuse/langchain';
import { SummaryOutput, SummaryOutputSchema } from '../schemas';
import { Summarizer, SummaryOutcome, SummaryRequest } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { createOpenRouterLLM, FALLBACK_MODEL, LLMConfig, resolveModelName } from './llm';

const SYSTEM_PROMPT = `You are a helpful assistant that curates a daily news brief.
First, evaluate if the article matches this criteria: "{criterion}".
If it does NOT match, set isRelevant to false and leave title and summary empty.
If it DOES match, set isRelevant to true, translate the news title to Korean,
and write a concise 4-5 sentence summary of the article in Korean.`;

const USER_PROMPT = `Title: {title}

Article Text:
{text}`;

export interface SummaryPromptInput {
  title: string;
  text: string;
  criterion: string;
}

/**
 * A model bound to the summary prompt; returns the raw structured reply
 */
export interface SummaryChain {
  invoke(input: SummaryPromptInput): Promise<unknown>;
}

export type SummaryChainFactory = (model: string) => SummaryChain;

/**
 * Build the prompt -> structured-output chain for one model
 */
export function createSummaryChainFactory(
  config: LLMConfig,
  callbacks: () => CallbackHandler[] = () => []
): SummaryChainFactory {
  const prompt = ChatPromptTemplate.fromMessages([
    ['system', SYSTEM_PROMPT],
    ['human', USER_PROMPT],
  ]);

  return (model: string): SummaryChain => {
    const structuredLLM = createOpenRouterLLM(model, config).withStructuredOutput<SummaryOutput>(SummaryOutputSchema);
    const chain = RunnableSequence.from([prompt, structuredLLM]);
    return {
      invoke: (input) => chain.invoke(input, { callbacks: callbacks() }),
    };
  };
}

function toOutcome(reply: unknown): SummaryOutcome {
  const parsed = SummaryOutputSchema.safeParse(reply);
  if (!parsed.success) {
    throw new Error(`Malformed reply: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  if (!parsed.data.isRelevant) {
    return { kind: 'irrelevant' };
  }

  const summary = parsed.data.summary?.trim() ?? '';
  if (!summary) {
    throw new Error('Empty summary returned by AI');
  }

  return { kind: 'processed', title: parsed.data.title?.trim() || '', summary };
}

/**
 * Relevance filter and summarizer in front of a chat model.
 * A failing or unusable reply is retried once on the fallback model; every failure
 * resolves to a `failed` outcome instead of an exception.
 */
export class ArticleSummarizer implements Summarizer {
  constructor(private readonly createChain: SummaryChainFactory) {}

  async summarize(request: SummaryRequest): Promise<SummaryOutcome> {
    const primary = resolveModelName(request.model);
    const models = primary === FALLBACK_MODEL ? [primary] : [primary, FALLBACK_MODEL];
    let lastReason = 'No model attempted';

    for (const model of models) {
      const stepId = debugLogger.stepStart('SUMMARIZER', `Summarizing with ${model}`, {
        title: request.title.substring(0, 80),
        textLength: request.text.length
      });

      try {
        const reply = await this.createChain(model).invoke({
          title: request.title,
          text: request.text,
          criterion: request.criterion,
        });
        const outcome = toOutcome(reply);
        debugLogger.stepFinish(stepId, { outcome: outcome.kind });

        if (outcome.kind === 'processed' && !outcome.title) {
          return { ...outcome, title: request.title };
        }
        return outcome;
      } catch (error) {
        lastReason = error instanceof Error ? error.message : String(error);
        debugLogger.stepError(stepId, 'SUMMARIZER', `Model ${model} failed`, error);
        console.warn(`Summarization with ${model} failed: ${lastReason}`);
      }
    }

    return { kind: 'failed', reason: lastReason };
  }
}
