import fs from 'fs';
import path from 'path';
import type { QueryResultRow } from 'pg';
import { z, type ZodType } from 'zod';
import { debugLogger } from '../utils/debug-logger';
import {
  conflictMessage,
  DocumentSchema,
  DocumentStore,
  SaveOptions,
  SaveResult,
  VersionedDocument,
} from './document-store';

/**
 * The part of a pg Pool or Client the store needs
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const VersionRowSchema = z.object({ version: z.coerce.number().int() });

const DocumentRowSchema = VersionRowSchema.extend({ content: z.unknown() });

type DocumentRow = z.infer<typeof DocumentRowSchema>;

function firstRow<T>(rows: QueryResultRow[], schema: ZodType<T>): T | undefined {
  return rows.length > 0 ? schema.parse(rows[0]) : undefined;
}

const SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON documents in a single Postgres table, one row per document.
 * Every write bumps the row version; conditional writes compare it in the WHERE clause.
 */
export class PostgresDocumentStore implements DocumentStore {
  constructor(private readonly client: SqlClient) {}

  async ensureSchema(): Promise<void> {
    const ddl = await fs.promises.readFile(SCHEMA_PATH, 'utf8');
    await this.client.query(ddl);
  }

  /**
   * Cheap connectivity check for the health endpoint
   */
  async ping(): Promise<boolean> {
    try {
      await this.client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async load<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<T> {
    const { content } = await this.loadVersioned(name, schema, fallback);
    return content;
  }

  async loadVersioned<T>(name: string, schema: DocumentSchema<T>, fallback: T): Promise<VersionedDocument<T>> {
    let row: DocumentRow | undefined;
    try {
      const result = await this.client.query(
        'SELECT content, version FROM documents WHERE name = $1',
        [name]
      );
      row = firstRow(result.rows, DocumentRowSchema);
    } catch (error) {
      console.error(`Error loading ${name}:`, errorMessage(error));
      return { content: fallback, version: null, valid: false };
    }

    if (!row) {
      return { content: fallback, version: null, valid: true };
    }

    const parsed = schema.safeParse(row.content);
    if (!parsed.success) {
      console.error(`Stored document ${name} is invalid, using default:`, parsed.error.message);
      return { content: fallback, version: row.version, valid: false };
    }

    return { content: parsed.data, version: row.version, valid: true };
  }

  async save<T>(name: string, document: T, changeDescription: string, options: SaveOptions = {}): Promise<SaveResult> {
    const stepId = debugLogger.stepStart('DB', `Saving ${name}`, {
      changeDescription,
      expectedVersion: options.expectedVersion
    });

    try {
      const json = JSON.stringify(document);
      let rows: QueryResultRow[];

      if (options.expectedVersion === undefined) {
        ({ rows } = await this.client.query(
          `INSERT INTO documents (name, content, version, change_description, updated_at)
           VALUES ($1, $2::jsonb, 1, $3, NOW())
           ON CONFLICT (name) DO UPDATE
             SET content = EXCLUDED.content,
                 version = documents.version + 1,
                 change_description = EXCLUDED.change_description,
                 updated_at = NOW()
           RETURNING version`,
          [name, json, changeDescription]
        ));
      } else if (options.expectedVersion === null) {
        ({ rows } = await this.client.query(
          `INSERT INTO documents (name, content, version, change_description, updated_at)
           VALUES ($1, $2::jsonb, 1, $3, NOW())
           ON CONFLICT (name) DO NOTHING
           RETURNING version`,
          [name, json, changeDescription]
        ));
      } else {
        ({ rows } = await this.client.query(
          `UPDATE documents
              SET content = $2::jsonb,
                  version = version + 1,
                  change_description = $3,
                  updated_at = NOW()
            WHERE name = $1 AND version = $4
           RETURNING version`,
          [name, json, changeDescription, options.expectedVersion]
        ));
      }

      const saved = firstRow(rows, VersionRowSchema);
      if (!saved) {
        const actual = await this.currentVersion(name);
        debugLogger.stepError(stepId, 'DB', `Stale write to ${name} rejected`, conflictMessage(name, options.expectedVersion ?? null, actual));
        return {
          ok: false,
          reason: 'conflict',
          message: conflictMessage(name, options.expectedVersion ?? null, actual),
        };
      }

      debugLogger.stepFinish(stepId, { version: saved.version });
      return { ok: true, version: saved.version };
    } catch (error) {
      debugLogger.stepError(stepId, 'DB', `Failed to save ${name}`, error);
      console.error(`Error saving ${name}:`, errorMessage(error));
      return { ok: false, reason: 'error', message: errorMessage(error) };
    }
  }

  private async currentVersion(name: string): Promise<number | null> {
    const { rows } = await this.client.query(
      'SELECT version FROM documents WHERE name = $1',
      [name]
    );
    return rows[0]?.version ?? null;
  }
}
