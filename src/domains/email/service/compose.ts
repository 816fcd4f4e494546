/**
 * @fileoverview Message composition and sending.
 *
 * Validates a SendRequest completely before touching the network, builds
 * the MIME message and hands it to Gmail as a base64url `raw`.
 */

import fs from 'fs/promises';
import path from 'path';
import { createMimeMessage } from 'mimetext';
import {
  CliError,
  GmailApiError,
  SendError,
  ValidationError,
  errorMessage,
} from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { GmailGateway, MessageRef, SendRequest, SendResult } from '../types.js';
import { invalidAddresses, toMailbox } from './addresses.js';

/** Gmail's message size ceiling, applied to the sum of attachment bytes. */
export const MAX_ATTACHMENT_BYTES = 25 * 1024 * 1024;

const CONTENT_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.gz': 'application/gzip',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.ics': 'text/calendar',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.ppt': 'application/vnd.ms-powerpoint',
  '.pptx': 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.mp3': 'audio/mpeg',
  '.mp4': 'video/mp4',
};

const logger = createLogger({ domain: 'email', operation: 'send' });

/**
 * File access used for the body file, attachments and saved results.
 */
export interface FileSource {
  size(filePath: string): Promise<number>;
  read(filePath: string): Promise<Buffer>;
  write(filePath: string, content: string): Promise<void>;
}

export const nodeFileSource: FileSource = {
  async size(filePath) {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      throw new Error(`${filePath} is not a regular file`);
    }
    return stat.size;
  },
  read: (filePath) => fs.readFile(filePath),
  write: (filePath, content) => fs.writeFile(filePath, content, 'utf-8'),
};

export interface Attachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface MimeMessage {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  body: string;
  attachments?: Attachment[];
}

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Build the MIME text of a message with mimetext: a single text/plain
 * body, or multipart/mixed once there are attachments.
 */
export function buildMimeMessage(message: MimeMessage): string {
  const msg = createMimeMessage();

  // Gmail rewrites From with the authenticated account on send.
  msg.setSender('me');
  msg.setRecipients(message.to.map(toMailbox));
  if (message.cc?.length) msg.setCc(message.cc.map(toMailbox));
  if (message.bcc?.length) msg.setBcc(message.bcc.map(toMailbox));
  msg.setSubject(message.subject);

  msg.addMessage({ contentType: 'text/plain', data: message.body });

  for (const attachment of message.attachments ?? []) {
    msg.addAttachment({
      filename: attachment.filename,
      contentType: attachment.contentType,
      data: attachment.content.toString('base64'),
    });
  }

  return msg.asRaw();
}

/** Encode MIME text as Gmail's `raw` field. */
export function encodeRaw(mime: string): string {
  return Buffer.from(mime, 'utf-8').toString('base64url');
}

/**
 * @throws ValidationError if the total exceeds MAX_ATTACHMENT_BYTES
 */
export function checkAttachmentBudget(sizes: readonly number[]): number {
  const total = sizes.reduce((sum, size) => sum + size, 0);
  if (total > MAX_ATTACHMENT_BYTES) {
    throw new ValidationError(
      `Attachments total ${total} bytes, which exceeds the 25 MB limit (${MAX_ATTACHMENT_BYTES} bytes)`
    );
  }
  return total;
}

interface ValidatedSend {
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  body: string;
  attachmentPaths: string[];
}

/**
 * Validate everything that can be checked locally, reading the body file
 * and sizing attachments but not yet reading their content.
 *
 * @throws ValidationError on the first problem found
 */
export async function validateSendRequest(request: SendRequest, files: FileSource = nodeFileSource): Promise<ValidatedSend> {
  const to = request.to ?? [];
  const cc = request.cc ?? [];
  const bcc = request.bcc ?? [];

  if (to.length === 0) {
    throw new ValidationError('At least one recipient is required in to.');
  }

  const hasBody = request.body !== undefined;
  const hasBodyFile = request.bodyFile !== undefined;
  if (hasBody && hasBodyFile) {
    throw new ValidationError('Provide either body or body-file, not both.');
  }
  if (!hasBody && !hasBodyFile) {
    throw new ValidationError('One of body or body-file is required.');
  }

  const invalid = invalidAddresses([...to, ...cc, ...bcc]);
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid email address: ${invalid.join(', ')}`);
  }

  const attachmentPaths = request.attachments ?? [];
  const sizes: number[] = [];
  for (const attachmentPath of attachmentPaths) {
    try {
      sizes.push(await files.size(attachmentPath));
    } catch (error) {
      throw new ValidationError(`Cannot read attachment ${attachmentPath}: ${errorMessage(error)}`);
    }
  }
  checkAttachmentBudget(sizes);

  let body = request.body ?? '';
  if (request.bodyFile !== undefined) {
    try {
      body = (await files.read(request.bodyFile)).toString('utf-8');
    } catch (error) {
      throw new ValidationError(`Cannot read body file ${request.bodyFile}: ${errorMessage(error)}`);
    }
  }

  return { to, cc, bcc, subject: request.subject ?? '', body, attachmentPaths };
}

/**
 * Validate, compose and send a message.
 *
 * @throws ValidationError before any network call when the request is invalid
 * @throws SendError when Gmail rejects the message
 * @throws AuthenticationError when the token cannot be refreshed
 * @throws MissingCredentialsError when the gateway cannot open a session
 */
export async function sendMessage(
  request: SendRequest,
  gateway: GmailGateway,
  files: FileSource = nodeFileSource
): Promise<SendResult> {
  const validated = await validateSendRequest(request, files);

  const attachments: Attachment[] = [];
  for (const attachmentPath of validated.attachmentPaths) {
    let content: Buffer;
    try {
      content = await files.read(attachmentPath);
    } catch (error) {
      throw new ValidationError(`Cannot read attachment ${attachmentPath}: ${errorMessage(error)}`);
    }
    const filename = path.basename(attachmentPath);
    attachments.push({ filename, contentType: contentTypeFor(filename), content });
  }

  const raw = encodeRaw(buildMimeMessage({
    to: validated.to,
    cc: validated.cc,
    bcc: validated.bcc,
    subject: validated.subject,
    body: validated.body,
    attachments,
  }));

  let sent: MessageRef;
  try {
    sent = await gateway.sendRaw(raw);
  } catch (error) {
    if (error instanceof GmailApiError) {
      throw new SendError(error.message, { status: error.status });
    }
    if (error instanceof CliError) throw error;
    throw new SendError(errorMessage(error));
  }

  logger.info('message_sent', {
    messageId: sent.id,
    recipients: validated.to.length + validated.cc.length + validated.bcc.length,
    attachments: attachments.length,
  });

  return {
    message_id: sent.id,
    thread_id: sent.threadId || sent.id,
    to: validated.to,
    subject: validated.subject,
  };
}
