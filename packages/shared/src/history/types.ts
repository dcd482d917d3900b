/**
 * History Store Contract
 *
 * Append-only log of filled forms, searchable by similarity of the text
 * they were filled from.
 */

import type { NewSubmission, SubmissionRecord } from '../types';

export interface HistoryStore {
  /** Back end name reported by /health */
  readonly kind: string;

  /**
   * Append a submission. The embedding of its input text is null when the
   * embedding provider is unavailable; saving never fails because of it.
   */
  save(submission: NewSubmission): Promise<SubmissionRecord>;

  /**
   * At most `limit` records (clamped to [1, 100]), most similar first.
   * A blank query returns the most recent records.
   */
  findSimilar(query: string, limit: number, templateName?: string): Promise<SubmissionRecord[]>;

  /** True when the back end is reachable */
  ping(): Promise<boolean>;

  close(): Promise<void>;
}
