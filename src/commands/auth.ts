import { getString } from '../cli/args.js';
import config from '../config.js';
import { exchangeAuthorizationCode, generateConsentUrl } from '../domains/google-core/providers/auth.js';
import { loadClientSecrets } from '../services/credentials/index.js';
import type { Command } from './types.js';

export const authCommand: Command = {
  name: 'auth',
  summary: 'Authorize this CLI: print the consent URL, then store the token for --code',
  usage: 'auth [--code CODE]',
  flags: {
    code: 'string',
  },
  errorType: 'AuthenticationError',

  async run(args, context) {
    const secrets = await loadClientSecrets(context.credentialsPath, config.google.redirectUri);
    const code = getString(args, 'code');

    if (code === undefined) {
      return {
        exitCode: 0,
        output: {
          status: 'success',
          auth_url: generateConsentUrl(secrets),
          next_step: 'Open auth_url, grant access, then run: gmail-query-cli auth --code CODE',
        },
      };
    }

    const credential = await exchangeAuthorizationCode(secrets, code.trim(), context.tokenStore);
    return {
      exitCode: 0,
      output: {
        status: 'success',
        authorized: true,
        scope: credential.scope ?? null,
        has_refresh_token: Boolean(credential.refreshToken),
      },
    };
  },
};
