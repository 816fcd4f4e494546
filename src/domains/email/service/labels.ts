/**
 * @fileoverview Label listing, creation, and per-message apply/remove.
 *
 * Labels are addressed by name here and by opaque id on the wire, so
 * apply/remove resolve the name with a list call first.
 */

import {
  AuthenticationError,
  GmailApiError,
  LabelError,
  ValidationError,
  errorMessage,
} from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { GmailGateway, Label, LabelBatchResult, LabelChange, LabelOutcome } from '../types.js';

/** Provider-owned labels; names compared case-insensitively. */
export const SYSTEM_LABEL_NAMES: ReadonlySet<string> = new Set([
  'INBOX',
  'SENT',
  'DRAFT',
  'SPAM',
  'TRASH',
  'UNREAD',
  'STARRED',
  'IMPORTANT',
  'CHAT',
]);

const logger = createLogger({ domain: 'email', operation: 'labels' });

export function isSystemLabelName(name: string): boolean {
  const upper = name.trim().toUpperCase();
  return SYSTEM_LABEL_NAMES.has(upper) || upper.startsWith('CATEGORY_');
}

function toLabelFailure(error: unknown): Error {
  if (error instanceof GmailApiError) {
    return new LabelError(error.message, 'rejected', { status: error.status });
  }
  if (error instanceof Error) return error;
  return new LabelError(String(error));
}

/**
 * List all labels, system and user.
 */
export async function listLabels(gateway: GmailGateway): Promise<Label[]> {
  try {
    return await gateway.listLabels();
  } catch (error) {
    throw toLabelFailure(error);
  }
}

/**
 * Create a user label.
 *
 * @throws ValidationError for an empty or reserved name, before any call
 * @throws LabelError (conflict) when a label with that name already exists
 */
export async function createLabel(name: string, gateway: GmailGateway): Promise<Label> {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Label name must be a non-empty string.');
  }
  if (isSystemLabelName(trimmed)) {
    throw new ValidationError(`"${trimmed}" is a reserved system label name and cannot be created.`);
  }

  try {
    const label = await gateway.createLabel(trimmed);
    logger.info('label_created', { labelId: label.id });
    return label;
  } catch (error) {
    if (error instanceof GmailApiError && error.status === 409) {
      throw new LabelError(`Label already exists: ${trimmed}`, 'conflict', { status: 409 });
    }
    throw toLabelFailure(error);
  }
}

/**
 * Resolve a label name to its label.
 * @throws LabelError (notFound) when no label has exactly that name
 */
export async function resolveLabel(labelName: string, gateway: GmailGateway): Promise<Label> {
  const labels = await listLabels(gateway);
  const match = labels.find((label) => label.name === labelName);
  if (!match) {
    throw new LabelError(`Label not found: ${labelName}`, 'notFound');
  }
  return match;
}

function uniqueIds(messageIds: readonly string[]): string[] {
  return [...new Set(messageIds.map((id) => id.trim()).filter(Boolean))];
}

async function modifyEach(
  action: 'apply' | 'remove',
  labelName: string,
  messageIds: readonly string[],
  gateway: GmailGateway
): Promise<LabelBatchResult> {
  if (!labelName.trim()) {
    throw new ValidationError('label-name is required.');
  }
  const ids = uniqueIds(messageIds);
  if (ids.length === 0) {
    throw new ValidationError('At least one message id is required.');
  }

  const label = await resolveLabel(labelName, gateway);
  const change: LabelChange = action === 'apply'
    ? { addLabelIds: [label.id] }
    : { removeLabelIds: [label.id] };

  const results: LabelOutcome[] = [];
  for (const id of ids) {
    try {
      await gateway.modifyMessage(id, change);
      results.push({ id, ok: true });
    } catch (error) {
      // A dead token fails every remaining id the same way.
      if (error instanceof AuthenticationError) throw error;
      results.push({ id, ok: false, error: errorMessage(error) });
    }
  }

  const failed = results.filter((result) => !result.ok).length;
  const logData = { action, labelId: label.id, total: ids.length, failed };
  if (failed > 0) {
    logger.warn('label_batch_partial_failure', logData);
  } else {
    logger.info('label_batch_completed', logData);
  }

  return {
    labelId: label.id,
    labelName: label.name,
    results,
    succeeded: results.length - failed,
    failed,
  };
}

/**
 * Add a label to each message. Already-labelled messages are unchanged.
 * Each id's outcome is reported separately.
 */
export function applyLabel(labelName: string, messageIds: readonly string[], gateway: GmailGateway): Promise<LabelBatchResult> {
  return modifyEach('apply', labelName, messageIds, gateway);
}

/**
 * Remove a label from each message. Messages without it are unchanged.
 * Each id's outcome is reported separately.
 */
export function removeLabel(labelName: string, messageIds: readonly string[], gateway: GmailGateway): Promise<LabelBatchResult> {
  return modifyEach('remove', labelName, messageIds, gateway);
}
