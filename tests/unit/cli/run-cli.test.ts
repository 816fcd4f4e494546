/**
 * End-to-end tests of the CLI dispatcher against an in-process gateway.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { clearMockState } from '../../mocks/gmail-api.js';
import { runCli, usage } from '../../../src/cli/index.js';
import type { CommandContext } from '../../../src/commands/types.js';
import type { FileSource } from '../../../src/domains/email/service/compose.js';
import { MemoryTokenStore } from '../../../src/services/credentials/index.js';
import { GmailApiError } from '../../../src/utils/errors.js';
import { FakeGmailGateway } from '../../helpers/fake-gateway.js';
import { buildMessage } from '../../fixtures/messages.js';

const noFiles: FileSource = {
  size: async (filePath) => {
    throw new Error(`ENOENT: ${filePath}`);
  },
  read: async (filePath) => {
    throw new Error(`ENOENT: ${filePath}`);
  },
  write: async (filePath) => {
    throw new Error(`EACCES: ${filePath}`);
  },
};

function mailbox(): FakeGmailGateway {
  return new FakeGmailGateway({
    labels: [
      { id: 'INBOX', name: 'INBOX', type: 'system' },
      { id: 'Label_1', name: 'Receipts', type: 'user' },
    ],
    messages: [
      buildMessage({ id: 'a', subject: 'One', from: 'x@example.com', to: 'me@example.com', date: 'd1', snippet: 's1' }),
      buildMessage({ id: 'b', subject: 'Two', from: 'y@example.com', to: 'me@example.com', date: 'd2', snippet: 's2' }),
      buildMessage({ id: 'c', subject: 'Three', from: 'z@example.com', to: 'me@example.com', date: 'd3', snippet: 's3' }),
    ],
  });
}

async function run(argv: string[], context: Partial<CommandContext> = {}) {
  const printed: string[] = [];
  const exitCode = await runCli(argv, { context, write: (text) => printed.push(text) });
  return { exitCode, printed };
}

function parseOutput(printed: string[]): unknown {
  expect(printed).toHaveLength(1);
  return JSON.parse(printed[0]);
}

describe('runCli', () => {
  let gateway: FakeGmailGateway;

  beforeEach(() => {
    clearMockState();
    gateway = mailbox();
  });

  describe('dispatch', () => {
    it('prints usage for --help', async () => {
      const { exitCode, printed } = await run(['--help']);
      expect(exitCode).toBe(0);
      expect(printed).toEqual([usage()]);
    });

    it('prints command usage for a command --help without any call', async () => {
      const { exitCode, printed } = await run(['read', '--help'], { gateway });
      expect(exitCode).toBe(0);
      expect(printed[0]).toContain('Usage: gmail-query-cli read --query STRING');
      expect(gateway.totalCalls).toBe(0);
    });

    it('rejects an unknown command', async () => {
      const { exitCode, printed } = await run(['archive']);
      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'ValidationError',
        message: 'Unknown command: archive. Expected one of read, bulk-read, send, labels, mark-read, auth',
      });
    });

    it('rejects a missing command', async () => {
      const { exitCode, printed } = await run([]);
      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toMatchObject({ error_type: 'ValidationError' });
    });

    it('reports an unknown option as ValidationError', async () => {
      const { exitCode, printed } = await run(['read', '--query', 'x', '--limit', '5'], { gateway });
      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'ValidationError',
        message: 'Unknown option: --limit',
      });
    });

    it('reports a stray argument as ValidationError', async () => {
      const { exitCode, printed } = await run(['read', '--query', 'x', 'extra'], { gateway });
      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'ValidationError',
        message: 'Unexpected argument: extra',
      });
      expect(gateway.totalCalls).toBe(0);
    });
  });

  describe('read', () => {
    it('prints projected messages', async () => {
      const { exitCode, printed } = await run(['read', '--query', 'is:unread', '--format', 'minimal'], { gateway });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        result_count: 3,
        query: 'is:unread',
        messages: [
          { id: 'a', threadId: 't-a' },
          { id: 'b', threadId: 't-b' },
          { id: 'c', threadId: 't-c' },
        ],
      });
    });

    it('defaults to metadata with seven keys per message', async () => {
      const { printed } = await run(['read', '--query', 'is:unread'], { gateway });

      const output = parseOutput(printed);
      expect(output).toMatchObject({ result_count: 3 });
      expect(output).toHaveProperty(['messages', 0], {
        id: 'a',
        threadId: 't-a',
        subject: 'One',
        from: 'x@example.com',
        to: 'me@example.com',
        date: 'd1',
        snippet: 's1',
      });
    });

    it('prints the provider message verbatim for a rejected query', async () => {
      gateway.failNext('listMessages', new GmailApiError('Invalid query', 400));

      const { exitCode, printed } = await run(['read', '--query', 'badop:'], { gateway });

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'SearchError',
        message: 'Invalid query',
      });
    });

    it('validates max-results before any call', async () => {
      const { exitCode, printed } = await run(['read', '--query', 'x', '--max-results', '101'], { gateway });

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toMatchObject({ status: 'error', error_type: 'ValidationError' });
      expect(gateway.totalCalls).toBe(0);
    });

    it('validates the format before any call', async () => {
      const { printed } = await run(['read', '--query', 'x', '--format', 'raw'], { gateway });

      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'ValidationError',
        message: '--format must be one of minimal, metadata, full, got "raw"',
      });
      expect(gateway.totalCalls).toBe(0);
    });

    it('reports missing setup as MissingCredentials', async () => {
      const missing = path.join(os.tmpdir(), 'gmail-cli-none', 'credentials.json');

      const { exitCode, printed } = await run(['read', '--query', 'x'], {
        credentialsPath: missing,
        tokenStore: new MemoryTokenStore(),
      });

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toMatchObject({ status: 'error', error_type: 'MissingCredentials' });
    });
  });

  describe('send', () => {
    it('sends and prints the sent ids', async () => {
      const { exitCode, printed } = await run(
        ['send', '--to', 'user@example.com, other@example.com', '--subject', 'Hello', '--body', 'Hi'],
        { gateway, files: noFiles }
      );

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        message_id: 'sent-1',
        thread_id: 'thread-sent-1',
        to: ['user@example.com', 'other@example.com'],
        subject: 'Hello',
      });
    });

    it('rejects an invalid recipient without sending', async () => {
      const { exitCode, printed } = await run(
        ['send', '--to', 'not-an-email', '--subject', 'Hello', '--body', 'Hi'],
        { gateway, files: noFiles }
      );

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'ValidationError',
        message: 'Invalid email address: not-an-email',
      });
      expect(gateway.calls.sendRaw).toBe(0);
    });

    it('requires a subject', async () => {
      const { printed } = await run(['send', '--to', 'user@example.com', '--body', 'Hi'], { gateway, files: noFiles });
      expect(parseOutput(printed)).toMatchObject({ message: 'Missing required option --subject' });
    });
  });

  describe('labels', () => {
    it('lists labels', async () => {
      const { exitCode, printed } = await run(['labels', '--action', 'list'], { gateway });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        count: 2,
        labels: [
          { id: 'INBOX', name: 'INBOX', type: 'system' },
          { id: 'Label_1', name: 'Receipts', type: 'user' },
        ],
      });
    });

    it('refuses to create a system label name', async () => {
      const { exitCode, printed } = await run(['labels', '--action', 'create', '--name', 'INBOX'], { gateway });

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toMatchObject({ error_type: 'ValidationError' });
      expect(gateway.totalCalls).toBe(0);
    });

    it('reports per-id outcomes and exits 1 on partial failure', async () => {
      const { exitCode, printed } = await run(
        ['labels', '--action', 'apply', '--label-name', 'Receipts', '--message-ids', 'a,missing'],
        { gateway }
      );

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'partial_failure',
        action: 'apply',
        label_name: 'Receipts',
        label_id: 'Label_1',
        results: [
          { id: 'a', ok: true },
          { id: 'missing', ok: false, error: 'Requested entity was not found.' },
        ],
        succeeded: 1,
        failed: 1,
      });
    });

    it('reports an unknown label as LabelError', async () => {
      const { printed } = await run(
        ['labels', '--action', 'remove', '--label-name', 'Nope', '--message-ids', 'a'],
        { gateway }
      );

      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'LabelError',
        message: 'Label not found: Nope',
      });
    });

    it('rejects an unknown action', async () => {
      const { printed } = await run(['labels', '--action', 'rename'], { gateway });
      expect(parseOutput(printed)).toMatchObject({ error_type: 'ValidationError' });
    });
  });

  describe('mark-read', () => {
    it('marks matching messages as read', async () => {
      const { exitCode, printed } = await run(['mark-read', '--query', 'is:unread', '--batch-size', '2'], { gateway });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        action: 'mark_as_read',
        query: 'is:unread',
        affected_messages: 3,
      });
      expect(gateway.calls.batchModify).toBe(2);
    });
  });

  describe('bulk-read', () => {
    it('prints every page of results with page metadata', async () => {
      const { exitCode, printed } = await run(['bulk-read', '--query', 'is:unread', '--format', 'minimal'], { gateway });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        result_count: 3,
        query: 'is:unread',
        messages: [
          { id: 'a', threadId: 't-a' },
          { id: 'b', threadId: 't-b' },
          { id: 'c', threadId: 't-c' },
        ],
        metadata: { pages_fetched: 1, format: 'minimal' },
      });
    });

    it('saves the results to --output-file and prints a summary', async () => {
      const outputFile = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'gmail-cli-bulk-')), 'emails.json');

      const { exitCode, printed } = await run(
        ['bulk-read', '--query', 'is:unread', '--max-results', '2', '--output-file', outputFile],
        { gateway }
      );

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        result_count: 2,
        query: 'is:unread',
        output_file: outputFile,
        metadata: { pages_fetched: 1, format: 'metadata' },
      });
      const saved: unknown = JSON.parse(fs.readFileSync(outputFile, 'utf-8'));
      expect(saved).toEqual({
        status: 'success',
        result_count: 2,
        query: 'is:unread',
        messages: [
          { id: 'a', threadId: 't-a', subject: 'One', from: 'x@example.com', to: 'me@example.com', date: 'd1', snippet: 's1' },
          { id: 'b', threadId: 't-b', subject: 'Two', from: 'y@example.com', to: 'me@example.com', date: 'd2', snippet: 's2' },
        ],
        metadata: { pages_fetched: 1, format: 'metadata' },
      });
    });

    it('reports an unwritable output file as SearchError', async () => {
      const { exitCode, printed } = await run(
        ['bulk-read', '--query', 'is:unread', '--output-file', '/out/emails.json'],
        { gateway, files: noFiles }
      );

      expect(exitCode).toBe(1);
      expect(parseOutput(printed)).toEqual({
        status: 'error',
        error_type: 'SearchError',
        message: 'Cannot write output file /out/emails.json: EACCES: /out/emails.json',
      });
    });
  });

  describe('auth', () => {
    function writeSecretsFile(): string {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gmail-cli-run-auth-'));
      const filePath = path.join(dir, 'credentials.json');
      fs.writeFileSync(filePath, JSON.stringify({
        installed: { client_id: 'test-client-id', client_secret: 'test-secret' },
      }));
      return filePath;
    }

    it('prints the consent URL', async () => {
      const { exitCode, printed } = await run(['auth'], { credentialsPath: writeSecretsFile() });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toMatchObject({
        status: 'success',
        auth_url: 'https://accounts.google.com/o/oauth2/auth?scope=https://www.googleapis.com/auth/gmail.modify&access_type=offline',
      });
    });

    it('stores the token for --code', async () => {
      const tokenStore = new MemoryTokenStore();

      const { exitCode, printed } = await run(['auth', '--code', ' test-code '], {
        credentialsPath: writeSecretsFile(),
        tokenStore,
      });

      expect(exitCode).toBe(0);
      expect(parseOutput(printed)).toEqual({
        status: 'success',
        authorized: true,
        scope: 'https://www.googleapis.com/auth/gmail.modify',
        has_refresh_token: true,
      });
      await expect(tokenStore.load()).resolves.toMatchObject({ accessToken: 'access-for-test-code' });
    });

    it('reports a missing client secrets file', async () => {
      const { printed } = await run(['auth'], { credentialsPath: path.join(os.tmpdir(), 'gmail-cli-none', 'c.json') });
      expect(parseOutput(printed)).toMatchObject({ error_type: 'MissingCredentials' });
    });
  });
});
