/**
 * @fileoverview Syntactic email address checks and CSV recipient parsing.
 */

const ADDRESS_PATTERN =
  /^[A-Za-z0-9.!#$%&'*+/=?^_`{|}~-]+@[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)+$/;

/** `Display Name <user@example.com>` */
const NAMED_ADDRESS_PATTERN = /^([^<>]*)<([^<>]+)>$/;

// Control characters would end the header line they are written into.
const CONTROL_CHARACTERS = /[\x00-\x1f\x7f]/;

/** Recipient split into the parts a MIME header needs. */
export interface Mailbox {
  name: string;
  addr: string;
}

/**
 * Bare address part of a recipient, unwrapping the display-name form.
 */
export function addressOf(recipient: string): string {
  const trimmed = recipient.trim();
  const named = NAMED_ADDRESS_PATTERN.exec(trimmed);
  return named ? named[2].trim() : trimmed;
}

/**
 * Check a recipient syntactically. Accepts `user@example.com` and
 * `Name <user@example.com>`; the domain needs at least one dot and no
 * part may contain a control character.
 */
export function isValidAddress(recipient: string): boolean {
  if (CONTROL_CHARACTERS.test(recipient)) return false;
  const address = addressOf(recipient);
  if (address.length > 254 || address.startsWith('.') || address.includes('..')) {
    return false;
  }
  return ADDRESS_PATTERN.test(address);
}

/**
 * Split a validated recipient into display name and address. mimetext
 * writes named mailboxes as RFC 2047 encoded-words.
 */
export function toMailbox(recipient: string): Mailbox {
  const trimmed = recipient.trim();
  const named = NAMED_ADDRESS_PATTERN.exec(trimmed);
  if (!named) return { name: '', addr: trimmed };

  return { name: named[1].trim().replace(/^"(.*)"$/, '$1'), addr: named[2].trim() };
}

/**
 * Split a comma-separated recipient list, dropping blanks.
 */
export function parseAddressList(csv: string | undefined): string[] {
  if (!csv) return [];
  return csv
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Recipients that fail the syntactic check.
 */
export function invalidAddresses(recipients: readonly string[]): string[] {
  return recipients.filter((recipient) => !isValidAddress(recipient));
}
