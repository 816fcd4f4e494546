/**
 * @fileoverview Email domain type definitions.
 */

/** Output projection selected by the caller. */
export type MessageFormat = 'minimal' | 'metadata' | 'full';

export const MESSAGE_FORMATS: readonly MessageFormat[] = ['minimal', 'metadata', 'full'];

export interface MessageHeader {
  name: string;
  value: string;
}

/** One node of the MIME payload tree. */
export interface MessagePart {
  partId?: string;
  mimeType?: string;
  filename?: string;
  headers: MessageHeader[];
  body?: {
    data?: string;
    size?: number;
    attachmentId?: string;
  };
  parts: MessagePart[];
}

/** Message as returned by the provider, decoded into typed form. */
export interface RawMessage {
  id: string;
  threadId: string;
  labelIds: string[];
  snippet: string;
  payload?: MessagePart;
}

/** Message reference returned by the list endpoint. */
export interface MessageRef {
  id: string;
  threadId: string;
}

export interface MessageListPage {
  messages: MessageRef[];
  nextPageToken?: string;
  resultSizeEstimate?: number;
}

export interface MinimalMessage {
  id: string;
  threadId: string;
}

export interface MetadataMessage extends MinimalMessage {
  subject: string;
  from: string;
  to: string;
  date: string;
  snippet: string;
}

export interface FullMessage extends MetadataMessage {
  body: string;
}

/** Maps each format to the shape it projects to. */
export interface ProjectionByFormat {
  minimal: MinimalMessage;
  metadata: MetadataMessage;
  full: FullMessage;
}

export type ProjectedMessage = ProjectionByFormat[MessageFormat];

export interface SearchRequest {
  query: string;
  maxResults?: number;
  format?: MessageFormat;
}

export interface SendRequest {
  to: string[];
  subject: string;
  body?: string;
  bodyFile?: string;
  cc?: string[];
  bcc?: string[];
  attachments?: string[];
}

export interface SendResult {
  message_id: string;
  thread_id: string;
  to: string[];
  subject: string;
}

export type LabelType = 'system' | 'user';

export interface Label {
  id: string;
  name: string;
  type: LabelType;
}

export type LabelAction = 'list' | 'create' | 'apply' | 'remove';

export const LABEL_ACTIONS: readonly LabelAction[] = ['list', 'create', 'apply', 'remove'];

/** Outcome of applying or removing a label on one message. */
export type LabelOutcome =
  | { id: string; ok: true }
  | { id: string; ok: false; error: string };

export interface LabelBatchResult {
  labelId: string;
  labelName: string;
  results: LabelOutcome[];
  succeeded: number;
  failed: number;
}

export interface MarkReadRequest {
  query: string;
  maxResults?: number;
  batchSize?: number;
}

export interface MarkReadResult {
  query: string;
  affected_messages: number;
}

/** Search past the single-page limit, following page tokens. */
export interface BulkReadRequest {
  query: string;
  maxResults?: number;
  format?: MessageFormat;
}

export interface BulkReadResult {
  result_count: number;
  query: string;
  messages: ProjectedMessage[];
  metadata: {
    pages_fetched: number;
    format: MessageFormat;
  };
}

/** Labels to add and remove on a message. */
export interface LabelChange {
  addLabelIds?: string[];
  removeLabelIds?: string[];
}

/**
 * Remote Gmail operations used by the services.
 *
 * Implementations decode provider JSON into the types above and report
 * failures as GmailApiError (status + provider message).
 */
export interface GmailGateway {
  listMessages(query: string, maxResults: number, pageToken?: string): Promise<MessageListPage>;
  getMessage(id: string, format: MessageFormat): Promise<RawMessage>;
  sendRaw(raw: string): Promise<MessageRef>;
  listLabels(): Promise<Label[]>;
  createLabel(name: string): Promise<Label>;
  modifyMessage(id: string, change: LabelChange): Promise<void>;
  batchModify(ids: string[], change: LabelChange): Promise<void>;
}
