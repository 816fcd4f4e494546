/**
 * @fileoverview Bulk mark-as-read.
 *
 * Pages through every message matching a query (up to a cap) and removes
 * the UNREAD label with batchModify, one call per batch.
 */

import { GmailApiError, LabelError, SearchError, ValidationError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { GmailGateway, MarkReadRequest, MarkReadResult } from '../types.js';
import { collectMessageIds } from './query.js';

export const DEFAULT_MARK_READ_MAX = 500;
export const MARK_READ_MAX_LIMIT = 5000;
export const DEFAULT_BATCH_SIZE = 100;
/** Gmail's batchModify id limit. */
export const BATCH_SIZE_LIMIT = 1000;

const logger = createLogger({ domain: 'email', operation: 'mark-read' });

function requireIntInRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

/**
 * Mark every message matching the query as read.
 *
 * @throws ValidationError before any call for out-of-range limits
 * @throws SearchError when listing fails
 * @throws LabelError when a batch modification fails
 */
export async function markRead(request: MarkReadRequest, gateway: GmailGateway): Promise<MarkReadResult> {
  const { query } = request;
  if (typeof query !== 'string' || !query.trim()) {
    throw new ValidationError('query is required.');
  }
  const maxResults = request.maxResults ?? DEFAULT_MARK_READ_MAX;
  const batchSize = request.batchSize ?? DEFAULT_BATCH_SIZE;
  requireIntInRange('maxResults', maxResults, 1, MARK_READ_MAX_LIMIT);
  requireIntInRange('batchSize', batchSize, 1, BATCH_SIZE_LIMIT);

  let ids: string[];
  try {
    ids = (await collectMessageIds(query, maxResults, gateway)).ids;
  } catch (error) {
    if (error instanceof GmailApiError) {
      throw new SearchError(error.message, { status: error.status });
    }
    throw error;
  }

  let processed = 0;
  for (let i = 0; i < ids.length; i += batchSize) {
    const batch = ids.slice(i, i + batchSize);
    try {
      await gateway.batchModify(batch, { removeLabelIds: ['UNREAD'] });
    } catch (error) {
      if (error instanceof GmailApiError) {
        throw new LabelError(
          `Marking messages as read failed after ${processed} of ${ids.length}: ${error.message}`,
          'rejected',
          { status: error.status, processed }
        );
      }
      throw error;
    }
    processed += batch.length;
    logger.info('mark_read_progress', { processed, total: ids.length });
  }

  return { query, affected_messages: processed };
}
