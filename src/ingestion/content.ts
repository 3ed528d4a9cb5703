import { CandidateEntry } from '../types';
import { stripHtml } from '../utils/html';

export const MIN_CONTENT_LENGTH = 20;
export const MAX_SUMMARY_INPUT_LENGTH = 4000;

/**
 * Richest available body of an entry: full content, then summary, then description
 */
export function selectEntryBody(entry: Pick<CandidateEntry, 'body'>): string {
  const { content, summary, description } = entry.body;
  const candidates = [content[0], summary, description];
  return candidates.find((value): value is string => typeof value === 'string' && value.trim().length > 0) ?? '';
}

/**
 * Plain text with markup removed and whitespace collapsed. Never throws.
 */
export function normalizeText(raw: unknown): string {
  return stripHtml(typeof raw === 'string' ? raw : '');
}

export function normalizedEntryText(entry: Pick<CandidateEntry, 'body'>): string {
  return normalizeText(selectEntryBody(entry));
}
