/**
 * Mock for @googleapis/gmail and google-auth-library.
 *
 * Provides configurable mailbox contents and injectable failures for testing
 * the Gmail gateway and OAuth flow without making real API calls.
 */

import { vi } from 'vitest';

/**
 * Mock message resource, shaped like the Gmail API's Message.
 */
export interface MockEmail {
  id: string;
  threadId: string;
  labelIds?: string[];
  snippet?: string;
  payload?: MockPart;
}

export interface MockPart {
  mimeType?: string;
  filename?: string;
  headers?: Array<{ name: string; value: string }>;
  body?: { data?: string; size?: number };
  parts?: MockPart[];
}

export interface MockLabel {
  id: string;
  name: string;
  type: 'system' | 'user';
}

export type GmailMethod =
  | 'messages.list'
  | 'messages.get'
  | 'messages.send'
  | 'messages.modify'
  | 'messages.batchModify'
  | 'labels.list'
  | 'labels.create';

// Gmail mock state
let mockEmails: MockEmail[] = [];
let mockLabels: MockLabel[] = [];
let queuedFailures = new Map<GmailMethod, Error[]>();
let callCounts = new Map<GmailMethod, number>();
let lastRequests = new Map<GmailMethod, unknown>();

// OAuth mock state
let shouldFailRefresh = false;
let shouldFailTokenExchange = false;

/**
 * Build an error shaped like the ones the Google client throws.
 */
export function gmailHttpError(status: number, message: string): Error & { response: { status: number; data: unknown } } {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: {
      status,
      data: { error: { code: status, message } },
    },
  });
}

/**
 * Set the mock emails to return from messages.list() and messages.get().
 */
export function setMockEmails(emails: MockEmail[]): void {
  mockEmails = emails.map((email) => ({ ...email, labelIds: [...(email.labelIds ?? [])] }));
}

/**
 * Set the labels returned from labels.list().
 */
export function setMockLabels(labels: MockLabel[]): void {
  mockLabels = [...labels];
}

/**
 * Make the next call(s) to `method` fail, one queued error per call.
 */
export function failNext(method: GmailMethod, ...errors: Error[]): void {
  queuedFailures.set(method, [...(queuedFailures.get(method) ?? []), ...errors]);
}

/**
 * Get the number of calls made to a Gmail method.
 */
export function getCallCount(method: GmailMethod): number {
  return callCounts.get(method) ?? 0;
}

/**
 * Get the parameters of the last call to a Gmail method.
 */
export function getLastRequest(method: GmailMethod): unknown {
  return lastRequests.get(method);
}

/**
 * Current labels of a mock email.
 */
export function getMockEmailLabels(id: string): string[] | undefined {
  return mockEmails.find((email) => email.id === id)?.labelIds;
}

/**
 * Set whether token refresh should fail.
 */
export function setShouldFailRefresh(fail: boolean): void {
  shouldFailRefresh = fail;
}

/**
 * Set whether the authorization code exchange should fail.
 */
export function setShouldFailTokenExchange(fail: boolean): void {
  shouldFailTokenExchange = fail;
}

/**
 * Clear mock state. Call this in beforeEach.
 */
export function clearMockState(): void {
  mockEmails = [];
  mockLabels = [];
  queuedFailures = new Map();
  callCounts = new Map();
  lastRequests = new Map();
  shouldFailRefresh = false;
  shouldFailTokenExchange = false;
}

function record(method: GmailMethod, params: unknown): void {
  callCounts.set(method, getCallCount(method) + 1);
  lastRequests.set(method, params);
  const failure = queuedFailures.get(method)?.shift();
  if (failure) {
    throw failure;
  }
}

function applyChange(email: MockEmail, add: string[] = [], remove: string[] = []): void {
  const labels = new Set(email.labelIds ?? []);
  for (const id of add) labels.add(id);
  for (const id of remove) labels.delete(id);
  email.labelIds = [...labels];
}

interface ListParams { q?: string; maxResults?: number; pageToken?: string }
interface GetParams { id: string; format?: string; metadataHeaders?: string[] }
interface SendParams { requestBody: { raw: string } }
interface ModifyParams { id: string; requestBody: { addLabelIds?: string[]; removeLabelIds?: string[] } }
interface BatchModifyParams { requestBody: { ids: string[]; addLabelIds?: string[]; removeLabelIds?: string[] } }
interface CreateLabelParams { requestBody: { name: string } }

// Mock gmail.users.messages.list; pageToken is the offset of the next page
const mockMessagesList = vi.fn(async (params: ListParams) => {
  record('messages.list', params);
  const start = params.pageToken ? parseInt(params.pageToken, 10) : 0;
  const end = start + (params.maxResults ?? 100);
  return {
    data: {
      messages: mockEmails.slice(start, end).map((e) => ({ id: e.id, threadId: e.threadId })),
      nextPageToken: end < mockEmails.length ? String(end) : undefined,
      resultSizeEstimate: mockEmails.length,
    },
  };
});

// Mock gmail.users.messages.get
const mockMessagesGet = vi.fn(async (params: GetParams) => {
  record('messages.get', params);
  const email = mockEmails.find((e) => e.id === params.id);
  if (!email) {
    throw gmailHttpError(404, 'Requested entity was not found.');
  }
  return { data: email };
});

// Mock gmail.users.messages.send
const mockMessagesSend = vi.fn(async (params: SendParams) => {
  record('messages.send', params);
  return { data: { id: 'sent-message-id', threadId: 'sent-thread-id', labelIds: ['SENT'] } };
});

// Mock gmail.users.messages.modify
const mockMessagesModify = vi.fn(async (params: ModifyParams) => {
  record('messages.modify', params);
  const email = mockEmails.find((e) => e.id === params.id);
  if (!email) {
    throw gmailHttpError(404, 'Requested entity was not found.');
  }
  applyChange(email, params.requestBody.addLabelIds, params.requestBody.removeLabelIds);
  return { data: { id: email.id, threadId: email.threadId, labelIds: email.labelIds } };
});

// Mock gmail.users.messages.batchModify
const mockMessagesBatchModify = vi.fn(async (params: BatchModifyParams) => {
  record('messages.batchModify', params);
  for (const email of mockEmails) {
    if (params.requestBody.ids.includes(email.id)) {
      applyChange(email, params.requestBody.addLabelIds, params.requestBody.removeLabelIds);
    }
  }
  return { data: '' };
});

// Mock gmail.users.labels.list
const mockLabelsList = vi.fn(async (params: { userId: string }) => {
  record('labels.list', params);
  return { data: { labels: mockLabels } };
});

// Mock gmail.users.labels.create
const mockLabelsCreate = vi.fn(async (params: CreateLabelParams) => {
  record('labels.create', params);
  if (mockLabels.some((label) => label.name === params.requestBody.name)) {
    throw gmailHttpError(409, 'Label name exists or conflicts');
  }
  const label: MockLabel = { id: `Label_${mockLabels.length + 1}`, name: params.requestBody.name, type: 'user' };
  mockLabels.push(label);
  return { data: label };
});

// Mock gmail object
const mockGmail = {
  users: {
    messages: {
      list: mockMessagesList,
      get: mockMessagesGet,
      send: mockMessagesSend,
      modify: mockMessagesModify,
      batchModify: mockMessagesBatchModify,
    },
    labels: {
      list: mockLabelsList,
      create: mockLabelsCreate,
    },
  },
};

// Mock OAuth2 client
const mockRefreshAccessToken = vi.fn(async () => {
  if (shouldFailRefresh) {
    throw new Error('Token has been expired or revoked.');
  }
  return {
    credentials: {
      access_token: 'new-access-token',
      expiry_date: Date.now() + 3600000,
    },
  };
});

const mockGetToken = vi.fn(async (code: string) => {
  if (shouldFailTokenExchange) {
    throw new Error('invalid_grant');
  }
  return {
    tokens: {
      access_token: `access-for-${code}`,
      refresh_token: 'test-refresh-token',
      expiry_date: 1700000000000,
      scope: 'https://www.googleapis.com/auth/gmail.modify',
      token_type: 'Bearer',
    },
  };
});

const mockSetCredentials = vi.fn();

const mockGenerateAuthUrl = vi.fn((options: { scope: string[]; access_type?: string }) => {
  return `https://accounts.google.com/o/oauth2/auth?scope=${options.scope.join('+')}&access_type=${options.access_type ?? ''}`;
});

class MockOAuth2Client {
  setCredentials = mockSetCredentials;
  refreshAccessToken = mockRefreshAccessToken;
  generateAuthUrl = mockGenerateAuthUrl;
  getToken = mockGetToken;
}

const mockGmailFactory = vi.fn(() => mockGmail);

// Set up the module mocks
vi.mock('@googleapis/gmail', () => ({
  gmail: mockGmailFactory,
}));

vi.mock('google-auth-library', () => ({
  OAuth2Client: MockOAuth2Client,
}));

export {
  mockGmail,
  mockGmailFactory,
  mockMessagesList,
  mockMessagesGet,
  mockMessagesSend,
  mockMessagesModify,
  mockMessagesBatchModify,
  mockLabelsList,
  mockLabelsCreate,
  mockSetCredentials,
  mockRefreshAccessToken,
  mockGetToken,
  mockGenerateAuthUrl,
};
