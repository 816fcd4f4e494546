export type * from './types.js';

export {
  createInvocationId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  getLogLevel,
  initObservability,
  setLogLevel,
} from './logger.js';

export {
  redactEmail,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
