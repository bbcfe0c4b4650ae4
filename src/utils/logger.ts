/**
 * Logger for SDN Lookup Service
 *
 * Upstream URLs may carry credentials in the query string (mirrors, signed
 * links), so request headers and source URLs are scrubbed before they reach
 * the log stream.
 */
import pino from 'pino';

// =============================================================================
// REDACTION
// =============================================================================

/**
 * Paths removed from every log line
 */
const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  '*.password',
  '*.token',
  '*.apiKey'
];

const CREDENTIAL_QUERY_PARAMS = /([?&](?:api[_-]?key|token|signature|sig|key)=)[^&#]*/gi;

/**
 * Strip userinfo and credential-like query parameters from a URL string
 */
export function redactUrl(value: string): string {
  return value
    .replace(/(\w+:\/\/)[^/@\s]+@/, '$1[REDACTED]@')
    .replace(CREDENTIAL_QUERY_PARAMS, '$1[REDACTED]');
}

// =============================================================================
// PINO CONFIGURATION
// =============================================================================

const logLevel = process.env.LOG_LEVEL || 'info';
const isProduction = process.env.NODE_ENV === 'production';
const usePretty = process.env.LOG_FORMAT === 'pretty';

const pinoOptions: pino.LoggerOptions = {
  level: logLevel,
  base: { service: 'sdn-lookup-service' },
  timestamp: pino.stdTimeFunctions.isoTime,

  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err
  },

  redact: {
    paths: REDACTED_PATHS,
    censor: '[REDACTED]'
  },

  formatters: {
    level: (label) => ({ level: label })
  },

  transport: usePretty && !isProduction ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname'
    }
  } : undefined
};

export const logger: pino.Logger = pino(pinoOptions);

/**
 * Child logger bound to a component name
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}
