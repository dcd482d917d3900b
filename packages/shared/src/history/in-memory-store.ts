/**
 * In-process history store, used when no database is configured.
 * Contents live as long as the process.
 */

import { ulid } from 'ulid';
import type { EmbeddingProvider } from '../providers/types';
import type { NewSubmission, SubmissionRecord } from '../types';
import { clampHistoryLimit, embedOrNull, rankSubmissions } from './ranking';
import type { HistoryStore } from './types';

export class InMemoryHistoryStore implements HistoryStore {
  readonly kind = 'memory';

  private readonly records: SubmissionRecord[] = [];

  constructor(
    private readonly embeddings: EmbeddingProvider | null = null,
    private readonly embeddingTimeoutMs = 15000
  ) {}

  get size(): number {
    return this.records.length;
  }

  async save(submission: NewSubmission): Promise<SubmissionRecord> {
    const embedding = await embedOrNull(this.embeddings, submission.inputText, this.embeddingTimeoutMs);

    const record: SubmissionRecord = {
      id: ulid(),
      templateName: submission.templateName,
      inputText: submission.inputText,
      filledForm: { ...submission.filledForm },
      createdAt: new Date().toISOString(),
      embedding,
    };
    this.records.push(record);
    return record;
  }

  async findSimilar(query: string, limit: number, templateName?: string): Promise<SubmissionRecord[]> {
    const max = clampHistoryLimit(limit);
    const candidates = templateName
      ? this.records.filter((record) => record.templateName === templateName)
      : this.records;

    if (!query.trim()) {
      return candidates.slice().reverse().slice(0, max);
    }

    const queryVector = await embedOrNull(this.embeddings, query, this.embeddingTimeoutMs);
    return rankSubmissions(candidates, query, queryVector, max);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
