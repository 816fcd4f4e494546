/**
 * @fileoverview Gmail REST gateway.
 *
 * The only place provider JSON is touched. Responses are decoded into the
 * email domain types; failures become GmailApiError with the provider's
 * status and message. Every call goes through the session for a token,
 * gets one refresh-and-retry on 401/403, and follows the retry policy on
 * 429/5xx.
 */

import { gmail as gmailApi } from '@googleapis/gmail';
import type { gmail_v1 } from '@googleapis/gmail';
import { OAuth2Client } from 'google-auth-library';
import config from '../../../config.js';
import { AuthenticationError, GmailApiError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { GoogleSession } from '../../google-core/providers/session.js';
import { decideRetry, type RetryPolicy } from '../../google-core/service/retry-policy.js';
import type {
  GmailGateway,
  Label,
  LabelChange,
  MessageFormat,
  MessageHeader,
  MessageListPage,
  MessagePart,
  MessageRef,
  RawMessage,
} from '../types.js';

/** Headers requested for metadata-format fetches. */
export const METADATA_HEADERS = ['Subject', 'From', 'To', 'Date'];

const USER_ID = 'me';

const logger = createLogger({ domain: 'email', operation: 'gmail-gateway' });

// ---------------------------------------------------------------------------
// Boundary decoding
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function statusOf(error: Record<string, unknown>): number | undefined {
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number') return error.code;
  if (typeof error.code === 'string' && /^\d{3}$/.test(error.code)) return parseInt(error.code, 10);
  return undefined;
}

function providerMessageOf(error: Record<string, unknown>): string | undefined {
  const data = isRecord(error.response) ? error.response.data : undefined;
  if (isRecord(data)) {
    if (isRecord(data.error) && typeof data.error.message === 'string') {
      return data.error.message;
    }
    if (typeof data.error_description === 'string') return data.error_description;
    if (typeof data.error === 'string') return data.error;
  }
  return undefined;
}

/**
 * Convert anything the Google client throws into a GmailApiError,
 * preserving the provider's own message.
 */
export function toGmailApiError(error: unknown): GmailApiError {
  if (error instanceof GmailApiError) return error;
  if (!isRecord(error)) {
    return new GmailApiError(String(error), undefined);
  }
  const status = statusOf(error);
  const message = providerMessageOf(error)
    ?? (error instanceof Error ? error.message : 'Unknown Gmail API error');
  return new GmailApiError(message, status);
}

function toHeaders(headers: gmail_v1.Schema$MessagePartHeader[] | undefined): MessageHeader[] {
  const result: MessageHeader[] = [];
  for (const header of headers ?? []) {
    if (typeof header.name === 'string') {
      result.push({ name: header.name, value: header.value ?? '' });
    }
  }
  return result;
}

/** Decode one payload node and its children. */
export function toMessagePart(part: gmail_v1.Schema$MessagePart): MessagePart {
  const decoded: MessagePart = {
    headers: toHeaders(part.headers),
    parts: (part.parts ?? []).map(toMessagePart),
  };
  if (part.partId) decoded.partId = part.partId;
  if (part.mimeType) decoded.mimeType = part.mimeType;
  if (part.filename) decoded.filename = part.filename;
  if (part.body) {
    decoded.body = {
      data: part.body.data ?? undefined,
      size: part.body.size ?? undefined,
      attachmentId: part.body.attachmentId ?? undefined,
    };
  }
  return decoded;
}

/**
 * Decode a message resource.
 * @throws GmailApiError if the provider returned a message without an id
 */
export function toRawMessage(data: gmail_v1.Schema$Message, requestedId: string): RawMessage {
  // Boundary: require id from API response
  if (!data.id) {
    throw new GmailApiError(`Gmail API returned message without id for id=${requestedId}`, undefined);
  }
  const message: RawMessage = {
    id: data.id,
    threadId: data.threadId || data.id,
    labelIds: data.labelIds ?? [],
    snippet: data.snippet ?? '',
  };
  if (data.payload) {
    message.payload = toMessagePart(data.payload);
  }
  return message;
}

function toLabel(label: gmail_v1.Schema$Label): Label | null {
  if (!label.id || !label.name) return null;
  return {
    id: label.id,
    name: label.name,
    type: label.type === 'system' ? 'system' : 'user',
  };
}

function toRequestFormat(format: MessageFormat): { format: string; metadataHeaders?: string[] } {
  if (format === 'metadata') {
    return { format: 'metadata', metadataHeaders: METADATA_HEADERS };
  }
  return { format };
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export interface GmailGatewayOptions {
  retryPolicy?: RetryPolicy;
  /** Wait between retries; injectable so tests don't sleep. */
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

export class GoogleGmailGateway implements GmailGateway {
  private readonly auth = new OAuth2Client();
  private readonly gmail: gmail_v1.Gmail;
  private readonly retryPolicy: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly session: GoogleSession,
    options: GmailGatewayOptions = {}
  ) {
    this.gmail = gmailApi({ version: 'v1', auth: this.auth });
    this.retryPolicy = options.retryPolicy ?? {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
    };
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Run one API call with token handling and the retry policy.
   *
   * @throws AuthenticationError when 401/403 persists after a refresh
   * @throws GmailApiError for every other provider failure
   */
  private async call<T>(operation: string, fn: (gmail: gmail_v1.Gmail) => Promise<T>): Promise<T> {
    let attempt = 1;
    let refreshed = false;

    for (;;) {
      const accessToken = await this.session.accessToken();
      this.auth.setCredentials({ access_token: accessToken });

      try {
        return await fn(this.gmail);
      } catch (error) {
        const apiError = toGmailApiError(error);

        if (isAuthStatus(apiError.status)) {
          if (refreshed) {
            throw new AuthenticationError(apiError.message, { status: apiError.status, operation });
          }
          refreshed = true;
          logger.info('auth_rejected_refreshing', { operation, status: apiError.status });
          await this.session.forceRefresh('rejected');
          continue;
        }

        const decision = decideRetry(apiError.status, attempt, this.retryPolicy);
        if (!decision.retry) {
          throw apiError;
        }

        logger.warn('gmail_call_retrying', {
          operation,
          status: apiError.status,
          attempt,
          maxAttempts: this.retryPolicy.maxAttempts,
          retryInMs: decision.delayMs,
        });
        await this.wait(decision.delayMs);
        attempt++;
      }
    }
  }

  async listMessages(query: string, maxResults: number, pageToken?: string): Promise<MessageListPage> {
    const response = await this.call('messages.list', (gmail) => gmail.users.messages.list({
      userId: USER_ID,
      q: query,
      maxResults,
      pageToken,
    }));

    const messages: MessageRef[] = [];
    for (const msg of response.data.messages ?? []) {
      if (!msg.id) continue; // boundary: skip messages without an id
      messages.push({ id: msg.id, threadId: msg.threadId || msg.id });
    }

    logger.debug('messages_listed', { count: messages.length, hasNextPage: Boolean(response.data.nextPageToken) });

    return {
      messages,
      nextPageToken: response.data.nextPageToken ?? undefined,
      resultSizeEstimate: response.data.resultSizeEstimate ?? undefined,
    };
  }

  async getMessage(id: string, format: MessageFormat): Promise<RawMessage> {
    const response = await this.call('messages.get', (gmail) => gmail.users.messages.get({
      userId: USER_ID,
      id,
      ...toRequestFormat(format),
    }));
    return toRawMessage(response.data, id);
  }

  async sendRaw(raw: string): Promise<MessageRef> {
    const response = await this.call('messages.send', (gmail) => gmail.users.messages.send({
      userId: USER_ID,
      requestBody: { raw },
    }));

    if (!response.data.id) {
      throw new GmailApiError('Gmail API returned sent message without id', undefined);
    }
    return {
      id: response.data.id,
      threadId: response.data.threadId || response.data.id,
    };
  }

  async listLabels(): Promise<Label[]> {
    const response = await this.call('labels.list', (gmail) => gmail.users.labels.list({
      userId: USER_ID,
    }));

    const labels: Label[] = [];
    for (const raw of response.data.labels ?? []) {
      const label = toLabel(raw);
      if (label) labels.push(label);
    }
    return labels;
  }

  async createLabel(name: string): Promise<Label> {
    const response = await this.call('labels.create', (gmail) => gmail.users.labels.create({
      userId: USER_ID,
      requestBody: {
        name,
        labelListVisibility: 'labelShow',
        messageListVisibility: 'show',
      },
    }));

    const label = toLabel(response.data);
    if (!label) {
      throw new GmailApiError(`Gmail API returned label without id for name=${name}`, undefined);
    }
    return label;
  }

  async modifyMessage(id: string, change: LabelChange): Promise<void> {
    await this.call('messages.modify', (gmail) => gmail.users.messages.modify({
      userId: USER_ID,
      id,
      requestBody: {
        addLabelIds: change.addLabelIds,
        removeLabelIds: change.removeLabelIds,
      },
    }));
  }

  async batchModify(ids: string[], change: LabelChange): Promise<void> {
    await this.call('messages.batchModify', (gmail) => gmail.users.messages.batchModify({
      userId: USER_ID,
      requestBody: {
        ids,
        addLabelIds: change.addLabelIds,
        removeLabelIds: change.removeLabelIds,
      },
    }));
  }
}
