/**
 * @fileoverview Search and message projection.
 *
 * The query string is passed to Gmail untouched: Gmail is the only query
 * interpreter. This module validates the request, fetches each listed
 * message in list order, and projects it into the requested format.
 */

import { GmailApiError, SearchError, ValidationError } from '../../../utils/errors.js';
import { createLogger, safeSnippet } from '../../../utils/observability/index.js';
import {
  MESSAGE_FORMATS,
  type FullMessage,
  type GmailGateway,
  type MessageFormat,
  type MessagePart,
  type MetadataMessage,
  type MinimalMessage,
  type ProjectedMessage,
  type ProjectionByFormat,
  type RawMessage,
  type SearchRequest,
} from '../types.js';

export const DEFAULT_MAX_RESULTS = 10;
export const MAX_RESULTS_LIMIT = 100;
export const DEFAULT_FORMAT: MessageFormat = 'metadata';
/** Gmail's list page size limit. */
export const LIST_PAGE_SIZE = 100;

const logger = createLogger({ domain: 'email', operation: 'search' });

export function isMessageFormat(value: unknown): value is MessageFormat {
  return MESSAGE_FORMATS.some((format) => format === value);
}

/**
 * Validate a search request and fill in defaults.
 * @throws ValidationError for out-of-range maxResults or an unknown format
 */
export function normalizeSearchRequest(request: SearchRequest): Required<SearchRequest> {
  if (typeof request.query !== 'string') {
    throw new ValidationError('query is required.');
  }

  const maxResults = request.maxResults ?? DEFAULT_MAX_RESULTS;
  if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_RESULTS_LIMIT) {
    throw new ValidationError(`maxResults must be an integer between 1 and ${MAX_RESULTS_LIMIT}, got ${maxResults}`);
  }

  const format = request.format ?? DEFAULT_FORMAT;
  if (!isMessageFormat(format)) {
    throw new ValidationError(`format must be one of ${MESSAGE_FORMATS.join(', ')}, got ${String(format)}`);
  }

  return { query: request.query, maxResults, format };
}

/**
 * Value of the first header with exactly this name (case-sensitive), or ''.
 */
export function getHeader(part: MessagePart | undefined, name: string): string {
  return part?.headers.find((h) => h.name === name)?.value ?? '';
}

function decodeBodyData(data: string | undefined): string {
  if (!data) return '';
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/**
 * First text/plain part in depth-first pre-order, starting with the payload itself.
 */
export function findPlainTextPart(part: MessagePart | undefined): MessagePart | undefined {
  if (!part) return undefined;
  if (part.mimeType === 'text/plain') return part;
  for (const child of part.parts) {
    const found = findPlainTextPart(child);
    if (found) return found;
  }
  return undefined;
}

/**
 * Decoded content of the first text/plain part, or '' if there is none.
 */
export function extractPlainTextBody(payload: MessagePart | undefined): string {
  return decodeBodyData(findPlainTextPart(payload)?.body?.data);
}

function projectMinimal(raw: RawMessage): MinimalMessage {
  return { id: raw.id, threadId: raw.threadId };
}

function projectMetadata(raw: RawMessage): MetadataMessage {
  return {
    id: raw.id,
    threadId: raw.threadId,
    subject: getHeader(raw.payload, 'Subject'),
    from: getHeader(raw.payload, 'From'),
    to: getHeader(raw.payload, 'To'),
    date: getHeader(raw.payload, 'Date'),
    snippet: raw.snippet,
  };
}

function projectFull(raw: RawMessage): FullMessage {
  return {
    ...projectMetadata(raw),
    body: extractPlainTextBody(raw.payload),
  };
}

/**
 * Project a raw message into the shape for `format`. Pure, no I/O.
 */
export function project<F extends MessageFormat>(raw: RawMessage, format: F): ProjectionByFormat[F];
export function project(raw: RawMessage, format: MessageFormat): ProjectedMessage {
  switch (format) {
    case 'minimal':
      return projectMinimal(raw);
    case 'metadata':
      return projectMetadata(raw);
    case 'full':
      return projectFull(raw);
  }
}

/**
 * Translate a provider failure during search into the domain error.
 */
export function toSearchFailure(error: unknown): Error {
  if (error instanceof GmailApiError) {
    return new SearchError(error.message, { status: error.status });
  }
  return error instanceof Error ? error : new SearchError(String(error));
}

/**
 * Run a search and project every match.
 *
 * Calls list once, then get once per listed id, sequentially and in the
 * order the list call returned. Nothing is cached between invocations.
 *
 * @throws ValidationError before any call when the request is invalid
 * @throws SearchError when Gmail rejects the query (message verbatim)
 * @throws AuthenticationError when the token cannot be refreshed
 */
export async function search(request: SearchRequest, gateway: GmailGateway): Promise<ProjectedMessage[]> {
  const { query, maxResults, format } = normalizeSearchRequest(request);

  try {
    const page = await gateway.listMessages(query, maxResults);
    logger.debug('search_listed', { query: safeSnippet(query, 80), count: page.messages.length, format });

    const projected: ProjectedMessage[] = [];
    for (const ref of page.messages.slice(0, maxResults)) {
      const raw = await gateway.getMessage(ref.id, format);
      projected.push(project(raw, format));
    }
    return projected;
  } catch (error) {
    throw toSearchFailure(error);
  }
}

export interface CollectedIds {
  ids: string[];
  /** Number of list calls made, including a final empty page. */
  pagesFetched: number;
}

/**
 * Collect up to `maxResults` message ids matching `query`, following page
 * tokens in pages of at most LIST_PAGE_SIZE.
 */
export async function collectMessageIds(query: string, maxResults: number, gateway: GmailGateway): Promise<CollectedIds> {
  const ids: string[] = [];
  let pagesFetched = 0;
  let pageToken: string | undefined;

  while (ids.length < maxResults) {
    const pageSize = Math.min(LIST_PAGE_SIZE, maxResults - ids.length);
    const page = await gateway.listMessages(query, pageSize, pageToken);
    pagesFetched++;
    if (page.messages.length === 0) break;

    for (const message of page.messages.slice(0, maxResults - ids.length)) {
      ids.push(message.id);
    }
    logger.info('messages_page_listed', { page: pagesFetched, collected: ids.length });

    pageToken = page.nextPageToken;
    if (!pageToken) break;
  }

  return { ids, pagesFetched };
}
