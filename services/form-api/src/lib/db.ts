/**
 * PostgreSQL History Store
 *
 * Submissions live in form_submissions (see schema/init.sql). Embeddings are
 * stored as double precision[] and ranked in process, so no vector extension
 * is required.
 */

import { Pool } from 'pg';
import { ulid } from 'ulid';
import {
  clampHistoryLimit,
  dbQueryDurationHistogram,
  embedOrNull,
  errorMessage,
  logger,
  rankSubmissions,
  type EmbeddingProvider,
  type FilledForm,
  type HistoryStore,
  type NewSubmission,
  type SubmissionRecord,
} from '@tradeform/shared';

/** Most recent submissions considered by a similarity search */
const MAX_SEARCH_CANDIDATES = 1000;

type SubmissionRow = {
  id: string;
  template_name: string;
  input_text: string;
  filled_form: unknown;
  embedding: number[] | null;
  created_at: Date;
};

const SELECT_COLUMNS = 'id, template_name, input_text, filled_form, embedding, created_at';

function toFilledForm(value: unknown): FilledForm {
  const filled: FilledForm = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return filled;

  for (const [name, fieldValue] of Object.entries(value)) {
    filled[name] = typeof fieldValue === 'string' ? fieldValue : '';
  }
  return filled;
}

function toRecord(row: SubmissionRow): SubmissionRecord {
  return {
    id: row.id,
    templateName: row.template_name,
    inputText: row.input_text,
    filledForm: toFilledForm(row.filled_form),
    createdAt: row.created_at.toISOString(),
    embedding: row.embedding,
  };
}

export interface PgHistoryStoreOptions {
  connectionString: string;
  embeddings: EmbeddingProvider | null;
  embeddingTimeoutMs: number;
}

export class PgHistoryStore implements HistoryStore {
  readonly kind = 'postgres';

  private readonly pool: Pool;
  private readonly embeddings: EmbeddingProvider | null;
  private readonly embeddingTimeoutMs: number;

  constructor(options: PgHistoryStoreOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
    });
    this.embeddings = options.embeddings;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
  }

  async save(submission: NewSubmission): Promise<SubmissionRecord> {
    const embedding = await embedOrNull(this.embeddings, submission.inputText, this.embeddingTimeoutMs);
    const startTime = Date.now();

    try {
      const result = await this.pool.query<SubmissionRow>(
        `INSERT INTO form_submissions (id, template_name, input_text, filled_form, embedding)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${SELECT_COLUMNS}`,
        [ulid(), submission.templateName, submission.inputText, JSON.stringify(submission.filledForm), embedding]
      );

      dbQueryDurationHistogram.observe({ operation: 'save_submission' }, (Date.now() - startTime) / 1000);
      return toRecord(result.rows[0]);
    } catch (error) {
      logger.error('Failed to save submission', error, { template: submission.templateName });
      throw error;
    }
  }

  async findSimilar(query: string, limit: number, templateName?: string): Promise<SubmissionRecord[]> {
    const max = clampHistoryLimit(limit);

    if (!query.trim()) {
      return this.selectRecent(max, templateName, 'recent_submissions');
    }

    const [queryVector, newestFirst] = await Promise.all([
      embedOrNull(this.embeddings, query, this.embeddingTimeoutMs),
      this.selectRecent(MAX_SEARCH_CANDIDATES, templateName, 'similarity_candidates'),
    ]);

    // Ranking ties keep insertion order
    const oldestFirst = newestFirst.slice().reverse();
    return rankSubmissions(oldestFirst, query, queryVector, max);
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('History database unreachable', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async selectRecent(
    limit: number,
    templateName: string | undefined,
    operation: string
  ): Promise<SubmissionRecord[]> {
    const startTime = Date.now();

    try {
      const result = templateName
        ? await this.pool.query<SubmissionRow>(
            `SELECT ${SELECT_COLUMNS} FROM form_submissions
             WHERE template_name = $1
             ORDER BY created_at DESC, id DESC
             LIMIT $2`,
            [templateName, limit]
          )
        : await this.pool.query<SubmissionRow>(
            `SELECT ${SELECT_COLUMNS} FROM form_submissions
             ORDER BY created_at DESC, id DESC
             LIMIT $1`,
            [limit]
          );

      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
      return result.rows.map(toRecord);
    } catch (error) {
      logger.error('Failed to query submissions', error, { operation, template: templateName });
      throw error;
    }
  }
}
