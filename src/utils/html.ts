import { sanitizeHtml } from './sanitize';

/**
 * Strip HTML tags and decode entities from feed text
 */
export function stripHtml(html: string): string {
  return sanitizeHtml(html);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
