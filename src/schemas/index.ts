import { z } from 'zod';

export const DEFAULT_FILTER_PROMPT =
  'Is this article related to Artificial Intelligence, Machine Learning, or LLMs?';

/**
 * Schema for one persisted article
 */
export const ArticleSchema = z.object({
  id: z.string().min(1),
  link: z.string().min(1),
  title: z.string(),
  summary: z.string(),
  source: z.string(),
  date: z.string(),
  timestamp: z.string(),
  summaryStatus: z.enum(['ok', 'failed', 'placeholder']).optional(),
});

export type Article = z.infer<typeof ArticleSchema>;

export const ArticleCollectionSchema = z.array(ArticleSchema);

/**
 * Run-time settings, edited by administrators and re-read on every scheduler tick
 */
export const SettingsSchema = z.object({
  rssUrls: z.array(z.string().url()).describe('Feeds polled on every run, in order'),
  updateIntervalMinutes: z.number().int().min(1).describe('Minimum gap between automatic runs'),
  enableAutoScrape: z.boolean().describe('Whether the scheduler may start runs'),
  model: z.string().min(1).describe('Model used for relevance filtering and summaries'),
  daysToScrape: z.number().min(0).describe('Recency horizon in days'),
  aiFilterPrompt: z.string().describe('Natural-language relevance criterion'),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const RunStatsSchema = z.object({
  lastAutoScrape: z.string().nullable(),
  scrapedCount: z.record(z.string(), z.number().int().min(0)),
});

export type RunStats = z.infer<typeof RunStatsSchema>;

export const RunStatusSchema = z.enum(['idle', 'running', 'error']);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export const RunLogEntrySchema = z.object({
  timestamp: z.string(),
  message: z.string(),
});

export type RunLogEntry = z.infer<typeof RunLogEntrySchema>;

export const RunLogDocumentSchema = z.object({
  lastUpdated: z.string().nullable(),
  status: RunStatusSchema,
  /** Fraction of the current run's candidates processed, 0 to 1 */
  progress: z.number().min(0).max(1).default(0),
  logs: z.array(RunLogEntrySchema),
});

export type RunLogDocument = z.infer<typeof RunLogDocumentSchema>;

/**
 * Structured reply expected from the summarization model
 */
export const SummaryOutputSchema = z.object({
  isRelevant: z.boolean().describe('Whether the article matches the relevance criterion'),
  title: z.string().optional().describe('Title translated to Korean (only when relevant)'),
  summary: z.string().optional().describe('Concise 4-5 sentence summary in Korean (only when relevant)'),
});

export type SummaryOutput = z.infer<typeof SummaryOutputSchema>;
