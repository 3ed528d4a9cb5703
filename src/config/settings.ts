import { DEFAULT_FILTER_PROMPT, Settings, SettingsSchema } from '../schemas';
import { DocumentStore, DOCUMENTS, SaveResult } from '../storage/document-store';

export const DEFAULT_SETTINGS: Settings = {
  rssUrls: [
    'https://feeds.feedburner.com/TechCrunch/startups',
    'https://www.theverge.com/rss/index.xml',
  ],
  updateIntervalMinutes: 180,
  enableAutoScrape: false,
  model: 'gpt-4o-mini',
  daysToScrape: 3,
  aiFilterPrompt: DEFAULT_FILTER_PROMPT,
};

/**
 * Settings as stored, or the defaults when the document is missing or invalid
 */
export function loadSettings(store: DocumentStore): Promise<Settings> {
  return store.load(DOCUMENTS.settings, SettingsSchema, DEFAULT_SETTINGS);
}

export function saveSettings(store: DocumentStore, settings: Settings, changeDescription: string): Promise<SaveResult> {
  return store.save(DOCUMENTS.settings, settings, changeDescription);
}
