/**
 * @fileoverview CLI dispatcher.
 *
 * Picks the command, parses its flags, runs it inside a per-invocation log
 * context and prints exactly one JSON document on stdout: the command's
 * result or the error envelope. Returns the process exit code.
 */

import config, { validateConfig } from '../config.js';
import { authCommand } from '../commands/auth.js';
import { bulkReadCommand } from '../commands/bulk-read.js';
import { labelsCommand } from '../commands/labels.js';
import { markReadCommand } from '../commands/mark-read.js';
import { readCommand } from '../commands/read.js';
import { sendCommand } from '../commands/send.js';
import type { Command, CommandContext } from '../commands/types.js';
import { openSession } from '../domains/google-core/providers/auth.js';
import { GoogleGmailGateway } from '../domains/email/providers/gmail.js';
import { LazyGmailGateway } from '../domains/email/providers/lazy.js';
import { nodeFileSource } from '../domains/email/service/compose.js';
import { createTokenStore } from '../services/credentials/index.js';
import { ValidationError, toErrorEnvelope, type ErrorType } from '../utils/errors.js';
import {
  createInvocationId,
  createLogger,
  initObservability,
  withLogContext,
} from '../utils/observability/index.js';
import { hasFlag, parseArgs } from './args.js';

export const COMMANDS: readonly Command[] = [
  readCommand,
  bulkReadCommand,
  sendCommand,
  labelsCommand,
  markReadCommand,
  authCommand,
];

const logger = createLogger({ domain: 'cli' });

export interface CliOptions {
  context?: Partial<CommandContext>;
  /** Receives the text printed on stdout. */
  write?: (text: string) => void;
}

function defaultWrite(text: string): void {
  process.stdout.write(`${text}\n`);
}

export function usage(): string {
  const lines = [
    'Usage: gmail-query-cli <command> [options]',
    '',
    'Commands:',
    ...COMMANDS.map((command) => `  ${command.name.padEnd(10)} ${command.summary}`),
    '',
    'Global options:',
    '  --verbose, -v  Log debug output to stderr',
    '  --help, -h     Show help',
    '',
    'Values may be given as --flag value or --flag=value; use the second form',
    'for a value that is itself the name of a flag.',
  ];
  return lines.join('\n');
}

function commandUsage(command: Command): string {
  return `Usage: gmail-query-cli ${command.usage}\n\n${command.summary}`;
}

function createDefaultContext(overrides: Partial<CommandContext>): CommandContext {
  const tokenStore = overrides.tokenStore ?? createTokenStore();
  const credentialsPath = overrides.credentialsPath ?? config.google.credentialsPath;
  return {
    tokenStore,
    credentialsPath,
    files: overrides.files ?? nodeFileSource,
    gateway: overrides.gateway ?? new LazyGmailGateway(async () => {
      const session = await openSession({ credentialsPath, store: tokenStore });
      return new GoogleGmailGateway(session);
    }),
  };
}

/**
 * Run one CLI invocation.
 *
 * @param argv arguments after the executable, e.g. `['read', '--query', 'is:unread']`
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const write = options.write ?? defaultWrite;
  const printJson = (value: unknown) => write(JSON.stringify(value, null, 2));

  const [name, ...rest] = argv;
  if (name === '--help' || name === '-h' || name === 'help') {
    write(usage());
    return 0;
  }

  const command = COMMANDS.find((candidate) => candidate.name === name);
  if (!command) {
    const message = name === undefined
      ? 'No command given. Run with --help for usage.'
      : `Unknown command: ${name}. Expected one of ${COMMANDS.map((c) => c.name).join(', ')}`;
    printJson(toErrorEnvelope(new ValidationError(message), 'ValidationError'));
    return 1;
  }

  const errorType: ErrorType = command.errorType;

  return withLogContext({ invocationId: createInvocationId(), command: command.name }, async () => {
    try {
      const args = parseArgs(rest, command.flags);
      if (hasFlag(args, 'help')) {
        write(commandUsage(command));
        return 0;
      }
      initObservability({ verbose: hasFlag(args, 'verbose') });

      try {
        validateConfig();
      } catch (error) {
        throw new ValidationError(error instanceof Error ? error.message : String(error));
      }

      const startedAt = Date.now();
      const result = await command.run(args, createDefaultContext(options.context ?? {}));
      logger.debug('command_completed', { exitCode: result.exitCode, durationMs: Date.now() - startedAt });

      printJson(result.output);
      return result.exitCode;
    } catch (error) {
      const envelope = toErrorEnvelope(error, errorType);
      logger.debug('command_failed', { errorType: envelope.error_type, error: envelope.message });
      printJson(envelope);
      return 1;
    }
  });
}
