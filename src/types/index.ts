import type { Article, RunLogEntry, RunStatus } from '../schemas';

export type { Article, RunLogEntry, RunStatus, Settings, RunStats, RunLogDocument } from '../schemas';

/**
 * Alternative body representations a feed item may carry, richest first.
 */
export interface EntryBody {
  content: string[];
  summary?: string;
  description?: string;
}

/**
 * One feed item considered during a single run. Never persisted.
 */
export interface CandidateEntry {
  link: string;
  title: string;
  publishedAt?: Date;
  updatedAt?: Date;
  body: EntryBody;
  sourceUrl: string;
}

export type FeedFetcher = (url: string) => Promise<CandidateEntry[]>;

export type SummaryOutcome =
  | { kind: 'irrelevant' }
  | { kind: 'processed'; title: string; summary: string }
  | { kind: 'failed'; reason: string };

export interface SummaryRequest {
  title: string;
  text: string;
  criterion: string;
  model: string;
}

export interface Summarizer {
  summarize(request: SummaryRequest): Promise<SummaryOutcome>;
}

/**
 * Receives human-readable status lines and progress fractions during a run.
 */
export interface ProgressReporter {
  status(message: string): Promise<void>;
  progress?(fraction: number): void;
}

export interface ReconcileResult {
  articles: Article[];
  newCount: number;
  updatedCount: number;
  totalChanges: number;
}

export type PersistOutcome = 'saved' | 'unchanged' | 'conflict' | 'failed';

export type IngestionTrigger = 'auto' | 'manual';

export interface IngestionStats {
  trigger: IngestionTrigger;
  candidates: number;
  feedErrors: string[];
  newCount: number;
  updatedCount: number;
  totalChanges: number;
  articleCount: number;
  persisted: PersistOutcome;
  persistError?: string;
}

export interface RunLogSnapshot {
  status: RunStatus;
  logs: RunLogEntry[];
}
