import { debugLogger } from '../utils/debug-logger';
import {
  conflictMessage,
  DocumentSchema,
  DocumentStore,
  SaveOptions,
  SaveResult,
  VersionedDocument,
} from './document-store';

interface StoredDocument {
  json: string;
  version: number;
  changeDescription: string;
  updatedAt: Date;
}

/**
 * Process-local document store. Documents are kept as serialized JSON so callers
 * never share object references with the store.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, StoredDocument>();

  async load<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<T> {
    const { content } = await this.loadVersioned(name, schema, fallback);
    return content;
  }

  async loadVersioned<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<VersionedDocument<T>> {
    const stored = this.documents.get(name);
    if (!stored) {
      return { content: fallback, version: null, valid: true };
    }

    const parsed = schema.safeParse(JSON.parse(stored.json));
    if (!parsed.success) {
      console.error(`Stored document ${name} is invalid, using default:`, parsed.error.message);
      return { content: fallback, version: stored.version, valid: false };
    }

    return { content: parsed.data, version: stored.version, valid: true };
  }

  async save<T>(name: string, document: T, changeDescription: string, options: SaveOptions = {}): Promise<SaveResult> {
    const current = this.documents.get(name);
    const currentVersion = current ? current.version : null;

    if (options.expectedVersion !== undefined && options.expectedVersion !== currentVersion) {
      debugLogger.warn('STORE', 'Rejected stale write', { name, expected: options.expectedVersion, actual: currentVersion });
      return { ok: false, reason: 'conflict', message: conflictMessage(name, options.expectedVersion, currentVersion) };
    }

    let json: string;
    try {
      json = JSON.stringify(document);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error saving ${name}:`, message);
      return { ok: false, reason: 'error', message };
    }

    const version = (currentVersion ?? 0) + 1;
    this.documents.set(name, { json, version, changeDescription, updatedAt: new Date() });
    debugLogger.info('STORE', `Saved ${name}`, { version, changeDescription });
    return { ok: true, version };
  }

  /**
   * Change description of the last write, for inspection in tests and tooling
   */
  lastChangeDescription(name: string): string | undefined {
    return this.documents.get(name)?.changeDescription;
  }
}
