import { getString, requireString } from '../cli/args.js';
import { LABEL_ACTIONS, type LabelAction, type LabelBatchResult } from '../domains/email/types.js';
import { applyLabel, createLabel, listLabels, removeLabel } from '../domains/email/service/labels.js';
import { ValidationError } from '../utils/errors.js';
import type { Command, CommandResult } from './types.js';

function isLabelAction(value: string): value is LabelAction {
  return LABEL_ACTIONS.some((action) => action === value);
}

function splitIds(csv: string): string[] {
  return csv.split(',').map((id) => id.trim()).filter(Boolean);
}

function batchOutput(action: 'apply' | 'remove', batch: LabelBatchResult): CommandResult {
  return {
    exitCode: batch.failed > 0 ? 1 : 0,
    output: {
      status: batch.failed > 0 ? 'partial_failure' : 'success',
      action,
      label_name: batch.labelName,
      label_id: batch.labelId,
      results: batch.results,
      succeeded: batch.succeeded,
      failed: batch.failed,
    },
  };
}

export const labelsCommand: Command = {
  name: 'labels',
  summary: 'List, create, apply or remove labels',
  usage: 'labels --action list|create|apply|remove [--name STRING] [--label-name STRING] [--message-ids CSV]',
  flags: {
    action: 'string',
    name: 'string',
    'label-name': 'string',
    'message-ids': 'string',
  },
  errorType: 'LabelError',

  async run(args, context) {
    const action = requireString(args, 'action');
    if (!isLabelAction(action)) {
      throw new ValidationError(`--action must be one of ${LABEL_ACTIONS.join(', ')}, got "${action}"`);
    }

    switch (action) {
      case 'list': {
        const labels = await listLabels(context.gateway);
        return { exitCode: 0, output: { status: 'success', count: labels.length, labels } };
      }
      case 'create': {
        const label = await createLabel(requireString(args, 'name'), context.gateway);
        return { exitCode: 0, output: { status: 'success', label } };
      }
      case 'apply':
      case 'remove': {
        const labelName = requireString(args, 'label-name');
        const messageIds = splitIds(getString(args, 'message-ids') ?? '');
        const batch = action === 'apply'
          ? await applyLabel(labelName, messageIds, context.gateway)
          : await removeLabel(labelName, messageIds, context.gateway);
        return batchOutput(action, batch);
      }
    }
  },
};
