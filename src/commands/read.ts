import { getInt, getString, requireString } from '../cli/args.js';
import { isMessageFormat, search } from '../domains/email/service/query.js';
import { ValidationError } from '../utils/errors.js';
import type { Command } from './types.js';

export const readCommand: Command = {
  name: 'read',
  summary: 'Search messages and print them in the chosen format',
  usage: 'read --query STRING [--max-results N=10] [--format minimal|metadata|full=metadata]',
  flags: {
    query: 'string',
    'max-results': 'string',
    format: 'string',
  },
  errorType: 'SearchError',

  async run(args, context) {
    const query = requireString(args, 'query');
    const maxResults = getInt(args, 'max-results');
    const format = getString(args, 'format');
    if (format !== undefined && !isMessageFormat(format)) {
      throw new ValidationError(`--format must be one of minimal, metadata, full, got "${format}"`);
    }

    const messages = await search({ query, maxResults, format }, context.gateway);

    return {
      exitCode: 0,
      output: {
        status: 'success',
        result_count: messages.length,
        query,
        messages,
      },
    };
  },
};
