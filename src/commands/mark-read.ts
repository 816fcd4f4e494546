import { getInt, requireString } from '../cli/args.js';
import { markRead } from '../domains/email/service/mark-read.js';
import type { Command } from './types.js';

export const markReadCommand: Command = {
  name: 'mark-read',
  summary: 'Mark every message matching a query as read',
  usage: 'mark-read --query STRING [--max-results N=500] [--batch-size N=100]',
  flags: {
    query: 'string',
    'max-results': 'string',
    'batch-size': 'string',
  },
  errorType: 'LabelError',

  async run(args, context) {
    const result = await markRead(
      {
        query: requireString(args, 'query'),
        maxResults: getInt(args, 'max-results'),
        batchSize: getInt(args, 'batch-size'),
      },
      context.gateway
    );

    return {
      exitCode: 0,
      output: { status: 'success', action: 'mark_as_read', ...result },
    };
  },
};
