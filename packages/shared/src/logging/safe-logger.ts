import { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * PII patterns that should be scrubbed from logs.
 * Tax ID patterns run first so phone patterns never see their digits.
 */
const PII_PATTERNS: { pattern: RegExp; replacement: string; name: string }[] = [
  // NPWP in its printed form, e.g. 01.234.567.8-012.000
  {
    pattern: /\b\d{2}\.\d{3}\.\d{3}\.\d-\d{3}\.\d{3}\b/g,
    replacement: '[NPWP:REDACTED]',
    name: 'npwp-formatted',
  },
  // Bare 15-digit NPWP
  {
    pattern: /\b\d{15}\b/g,
    replacement: '[NPWP:REDACTED]',
    name: 'npwp',
  },
  // 16-digit NIK (also used as NPWP for individuals)
  {
    pattern: /\b\d{16}\b/g,
    replacement: '[NIK:REDACTED]',
    name: 'nik',
  },
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // Indonesian mobile numbers
  {
    pattern: /(?:\+62|\b62|\b0)8\d{1,2}[\s-]?\d{3,4}[\s-]?\d{3,5}\b/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-id',
  },
  // International phone numbers
  {
    pattern: /\+\d{1,3}[\s\-.]?\(?\d{2,4}\)?[\s\-.]?\d{3,4}[\s\-.]?\d{3,4}/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-intl',
  },
  // Card numbers printed in groups
  {
    pattern: /\b\d{4}[\s-]\d{4}[\s-]\d{4}[\s-]\d{4}\b/g,
    replacement: '[CC:REDACTED]',
    name: 'creditcard',
  },
];

/**
 * Fields that should be completely redacted when found in context (lowercase)
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'credentials',
  'npwp',
  'npwppenjual',
  'npwppembeli',
  'npwplawantransaksi',
  'nik',
  'namapenjual',
  'namapembeli',
  'namalawantransaksi',
  'alamat',
  'alamatpenjual',
  'alamatlawantransaksi',
  'address',
  'email',
  'phone',
  'rawtext',
]);

/**
 * Scrub PII from a string value
 */
export function scrubString(value: string): string {
  let result = value;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Recursively scrub PII from an object
 */
function scrubObject(obj: unknown, depth = 0): unknown {
  // Prevent infinite recursion
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return scrubString(obj);
  }

  if (typeof obj === 'number' || typeof obj === 'boolean') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => scrubObject(item, depth + 1));
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: scrubString(obj.message) };
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELD_NAMES.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = scrubObject(value, depth + 1);
      }
    }
    return result;
  }

  // Functions, symbols, etc.
  return '[UNSUPPORTED_TYPE]';
}

/**
 * Scrub the values of a log context, redacting sensitive keys outright
 */
function scrubRecord(record: Record<string, unknown>): Record<string, unknown> {
  const scrubbed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    scrubbed[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
      ? '[REDACTED]'
      : scrubObject(value, 1);
  }
  return scrubbed;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Correlation ID to include in all log entries
   */
  correlationId?: string;

  /**
   * Run ID to include in all log entries
   */
  runId?: string;

  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;
}

/**
 * Create a logger that scrubs tax IDs, NIK numbers, contact data and party
 * names from messages and context before they reach the console.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ runId: 'run-abc' });
 * logger.info('Extracted fields', { npwpPenjual: '012345678012000' });
 * // ... {"runId":"run-abc","npwpPenjual":"[REDACTED]"}
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const baseLogger = createLogger(options);
  const scrubPii = options.scrubPii ?? true;

  const baseContext: Record<string, unknown> = {};
  if (options.correlationId !== undefined) {
    baseContext['correlationId'] = options.correlationId;
  }
  if (options.runId !== undefined) {
    baseContext['runId'] = options.runId;
  }

  const scrubContext = (context?: Record<string, unknown>): Record<string, unknown> => {
    const merged = { ...baseContext, ...context };
    return scrubPii ? scrubRecord(merged) : merged;
  };

  const scrubMessage = (message: string): string => (scrubPii ? scrubString(message) : message);

  const safeLogger: Logger = {
    debug(message: string, context?: Record<string, unknown>) {
      baseLogger.debug(scrubMessage(message), scrubContext(context));
    },

    info(message: string, context?: Record<string, unknown>) {
      baseLogger.info(scrubMessage(message), scrubContext(context));
    },

    warn(message: string, context?: Record<string, unknown>) {
      baseLogger.warn(scrubMessage(message), scrubContext(context));
    },

    error(message: string, context?: Record<string, unknown>) {
      baseLogger.error(scrubMessage(message), scrubContext(context));
    },

    child(context: Record<string, unknown>): Logger {
      const childOptions: SafeLoggerOptions = {
        ...options,
        context: { ...options.context, ...(scrubPii ? scrubRecord(context) : context) },
      };
      return createSafeLogger(childOptions);
    },
  };

  return safeLogger;
}
