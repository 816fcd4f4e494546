/**
 * @fileoverview Paginated search for result sets larger than one page.
 *
 * Same projections as a plain search; ids are collected page by page
 * first, then each message is fetched in list order.
 */

import { ValidationError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import {
  MESSAGE_FORMATS,
  type BulkReadRequest,
  type BulkReadResult,
  type GmailGateway,
  type ProjectedMessage,
} from '../types.js';
import { DEFAULT_FORMAT, collectMessageIds, isMessageFormat, project, toSearchFailure } from './query.js';

export const DEFAULT_BULK_MAX_RESULTS = 500;
export const BULK_MAX_RESULTS_LIMIT = 5000;
/** Fetch progress is logged every this many messages. */
export const PROGRESS_INTERVAL = 50;

const logger = createLogger({ domain: 'email', operation: 'bulk-read' });

/**
 * Fetch and project up to `maxResults` messages matching the query.
 *
 * @throws ValidationError before any call when the request is invalid
 * @throws SearchError when Gmail rejects a list or get call
 */
export async function bulkRead(request: BulkReadRequest, gateway: GmailGateway): Promise<BulkReadResult> {
  const { query } = request;
  if (typeof query !== 'string' || !query.trim()) {
    throw new ValidationError('query is required.');
  }

  const maxResults = request.maxResults ?? DEFAULT_BULK_MAX_RESULTS;
  if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > BULK_MAX_RESULTS_LIMIT) {
    throw new ValidationError(
      `maxResults must be an integer between 1 and ${BULK_MAX_RESULTS_LIMIT}, got ${maxResults}`
    );
  }

  const format = request.format ?? DEFAULT_FORMAT;
  if (!isMessageFormat(format)) {
    throw new ValidationError(`format must be one of ${MESSAGE_FORMATS.join(', ')}, got ${String(format)}`);
  }

  try {
    const { ids, pagesFetched } = await collectMessageIds(query, maxResults, gateway);
    logger.info('bulk_read_listed', { total: ids.length, pagesFetched });

    const messages: ProjectedMessage[] = [];
    for (const id of ids) {
      messages.push(project(await gateway.getMessage(id, format), format));
      if (messages.length % PROGRESS_INTERVAL === 0) {
        logger.info('bulk_read_progress', { fetched: messages.length, total: ids.length });
      }
    }

    return {
      result_count: messages.length,
      query,
      messages,
      metadata: { pages_fetched: pagesFetched, format },
    };
  } catch (error) {
    throw toSearchFailure(error);
  }
}
