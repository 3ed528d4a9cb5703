import type { ZodType, ZodTypeDef } from 'zod';

/** Validates stored content; its input side may differ from T (defaults, coercion) */
export type DocumentSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface VersionedDocument<T> {
  content: T;
  /** null when the document does not exist yet */
  version: number | null;
  /**
   * false when a stored document could not be read or failed its schema;
   * `content` is then the fallback and must not be written back over it.
   */
  valid: boolean;
}

export interface SaveOptions {
  /**
   * undefined: overwrite whatever is stored (last writer wins).
   * null: create only; fails with a conflict if the document exists.
   * number: compare-and-swap against the stored version.
   */
  expectedVersion?: number | null;
}

export type SaveResult =
  | { ok: true; version: number }
  | { ok: false; reason: 'conflict' | 'error'; message: string };

/**
 * Named JSON documents with optimistic-concurrency writes.
 * Reads degrade to the fallback and writes report failure; neither throws.
 */
export interface DocumentStore {
  load<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<T>;
  loadVersioned<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<VersionedDocument<T>>;
  save<T>(name: string, document: T, changeDescription: string, options?: SaveOptions): Promise<SaveResult>;
}

export const DOCUMENTS = {
  articles: 'news_data.json',
  settings: 'config.json',
  stats: 'stats.json',
  logs: 'logs.json',
} as const;

export function conflictMessage(name: string, expected: number | null, actual: number | null): string {
  return `Document ${name} changed since it was read (expected version ${expected ?? 'none'}, found ${actual ?? 'none'})`;
}
