/**
 * @fileoverview Command contract shared by the CLI dispatcher and each command.
 */

import type { FlagSpec, ParsedArgs } from '../cli/args.js';
import type { GmailGateway } from '../domains/email/types.js';
import type { FileSource } from '../domains/email/service/compose.js';
import type { TokenStore } from '../services/credentials/index.js';
import type { ErrorType } from '../utils/errors.js';

/**
 * Collaborators a command may use. In production the gateway opens the
 * session on its first call, so local validation failures never need
 * credentials.
 */
export interface CommandContext {
  gateway: GmailGateway;
  files: FileSource;
  tokenStore: TokenStore;
  credentialsPath: string;
}

export interface CommandResult {
  exitCode: number;
  output: Record<string, unknown>;
}

export interface Command {
  name: string;
  summary: string;
  usage: string;
  flags: FlagSpec;
  /** Envelope type for failures outside the error taxonomy. */
  errorType: ErrorType;
  run(args: ParsedArgs, context: CommandContext): Promise<CommandResult>;
}
