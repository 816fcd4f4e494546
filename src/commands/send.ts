import { getAll, getString, requireString } from '../cli/args.js';
import { parseAddressList } from '../domains/email/service/addresses.js';
import { sendMessage } from '../domains/email/service/compose.js';
import type { Command } from './types.js';

export const sendCommand: Command = {
  name: 'send',
  summary: 'Send a plain-text message, optionally with attachments',
  usage: 'send --to CSV --subject STRING (--body STRING | --body-file PATH) [--cc CSV] [--bcc CSV] [--attach PATH]...',
  flags: {
    to: 'string',
    subject: 'string',
    body: 'string',
    'body-file': 'string',
    cc: 'string',
    bcc: 'string',
    attach: 'multi',
  },
  errorType: 'SendError',

  async run(args, context) {
    const result = await sendMessage(
      {
        to: parseAddressList(getString(args, 'to')),
        subject: requireString(args, 'subject'),
        body: getString(args, 'body'),
        bodyFile: getString(args, 'body-file'),
        cc: parseAddressList(getString(args, 'cc')),
        bcc: parseAddressList(getString(args, 'bcc')),
        attachments: getAll(args, 'attach'),
      },
      context.gateway,
      context.files
    );

    return {
      exitCode: 0,
      output: { status: 'success', ...result },
    };
  },
};
