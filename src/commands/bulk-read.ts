import { getInt, getString, requireString } from '../cli/args.js';
import { bulkRead } from '../domains/email/service/bulk-read.js';
import { isMessageFormat } from '../domains/email/service/query.js';
import { SearchError, ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type { Command } from './types.js';

const logger = createLogger({ domain: 'cli', operation: 'bulk-read' });

export const bulkReadCommand: Command = {
  name: 'bulk-read',
  summary: 'Search across result pages, optionally saving the results to a file',
  usage: 'bulk-read --query STRING [--max-results N=500] [--format minimal|metadata|full=metadata] [--output-file PATH]',
  flags: {
    query: 'string',
    'max-results': 'string',
    format: 'string',
    'output-file': 'string',
  },
  errorType: 'SearchError',

  async run(args, context) {
    const query = requireString(args, 'query');
    const maxResults = getInt(args, 'max-results');
    const format = getString(args, 'format');
    if (format !== undefined && !isMessageFormat(format)) {
      throw new ValidationError(`--format must be one of minimal, metadata, full, got "${format}"`);
    }
    const outputFile = getString(args, 'output-file');
    if (outputFile !== undefined && !outputFile.trim()) {
      throw new ValidationError('--output-file must not be empty');
    }

    const result = await bulkRead({ query, maxResults, format }, context.gateway);
    const document = { status: 'success', ...result };

    if (outputFile === undefined) {
      return { exitCode: 0, output: document };
    }

    try {
      await context.files.write(outputFile, JSON.stringify(document, null, 2));
    } catch (error) {
      throw new SearchError(`Cannot write output file ${outputFile}: ${errorMessage(error)}`);
    }
    logger.info('bulk_read_saved', { resultCount: result.result_count, outputFile });

    return {
      exitCode: 0,
      output: {
        status: 'success',
        result_count: result.result_count,
        query,
        output_file: outputFile,
        metadata: result.metadata,
      },
    };
  },
};
