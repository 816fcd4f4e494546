import { describe, expect, it } from 'vitest';
import { redactEmail, redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('masks the local part of email addresses', () => {
    expect(redactEmail('jane.doe@example.com')).toBe('j***@example.com');
    expect(redactEmail('From Jane <jane@example.com>, bob@example.org')).toBe(
      'From Jane <j***@example.com>, b***@example.org'
    );
  });

  it('redacts sensitive keys and message content', () => {
    const input = {
      from: 'jane@example.com',
      accessToken: 'abc123',
      body: 'Lunch at noon?',
      snippet: 'Lunch at',
      nested: {
        client_secret: 'test-secret',
        code: 'test-code',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted.from).toBe('j***@example.com');
    expect(redacted.accessToken).toBe('[REDACTED]');
    expect(redacted.body).toBe(`[REDACTED_TEXT len=${input.body.length}]`);
    expect(redacted.snippet).toBe('[REDACTED_TEXT len=8]');
    expect(redacted.nested).toEqual({ client_secret: '[REDACTED]', code: '[REDACTED]' });
  });

  it('keeps counts and ids readable', () => {
    expect(redactSecrets({ messageId: 'm1', count: 3, ok: true })).toEqual({ messageId: 'm1', count: 3, ok: true });
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
