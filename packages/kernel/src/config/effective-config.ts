import { z } from 'zod';
import type { DecimalAmount } from '@efaktur/contracts';
import {
  canonicalize,
  ConfigurationError,
  DEFAULT_AMOUNT_TOLERANCE,
  isValidDecimalAmount,
  type LogLevel,
} from '@efaktur/shared';
import { DEFAULT_NAME_POLICY, type NameComparisonPolicy } from '@efaktur/steps-deviation';

/**
 * Where authoritative records come from
 */
export type AuthorityMode = 'live' | 'fixture';

/**
 * Complete validator configuration.
 */
export interface ValidatorConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
  readonly maxUploadBytes: number;
  readonly authority: {
    readonly mode: AuthorityMode;
    /** Required in fixture mode */
    readonly fixturePath?: string;
    readonly timeoutMs: number;
    /** Lowercase host names; empty allows any host */
    readonly allowedHosts: readonly string[];
  };
  readonly ocr: {
    /** Tesseract language codes joined by `+` */
    readonly languages: string;
    readonly langPath?: string;
  };
  readonly comparison: {
    readonly amountTolerance: DecimalAmount;
    readonly namePolicy: NameComparisonPolicy;
  };
  /** Return the normalized document text with successful outcomes */
  readonly includeRawText: boolean;
}

/**
 * Default system configuration.
 */
export const DEFAULT_VALIDATOR_CONFIG: ValidatorConfig = {
  port: 8000,
  host: '0.0.0.0',
  logLevel: 'info',
  maxUploadBytes: 10 * 1024 * 1024,
  authority: {
    mode: 'live',
    timeoutMs: 10_000,
    allowedHosts: [],
  },
  ocr: {
    languages: 'eng+ind',
  },
  comparison: {
    amountTolerance: DEFAULT_AMOUNT_TOLERANCE,
    namePolicy: DEFAULT_NAME_POLICY,
  },
  includeRawText: false,
};

const positiveInt = z.coerce.number().int().positive();

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'], {
    errorMap: () => ({ message: 'Expected true/false, 1/0 or yes/no' }),
  })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const tolerance = z
  .string()
  .refine((value) => isValidDecimalAmount(value) && !value.trim().startsWith('-'), {
    message: 'Expected a non-negative decimal amount',
  })
  .transform((value) => canonicalize(value));

const hostList = z.string().transform((value) =>
  value
    .split(',')
    .map((host) => host.trim().toLowerCase())
    .filter((host) => host.length > 0),
);

/**
 * Environment variables read by the validator. All optional; empty strings
 * count as unset.
 */
const envSchema = z
  .object({
    PORT: positiveInt.max(65_535).optional(),
    HOST: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    MAX_UPLOAD_BYTES: positiveInt.optional(),
    AUTHORITY_MODE: z.enum(['live', 'fixture']).optional(),
    AUTHORITY_FIXTURE_PATH: z.string().min(1).optional(),
    AUTHORITY_TIMEOUT_MS: positiveInt.optional(),
    AUTHORITY_ALLOWED_HOSTS: hostList.optional(),
    OCR_LANGUAGES: z
      .string()
      .regex(/^[a-z_]+(\+[a-z_]+)*$/i, 'Expected language codes joined by "+"')
      .optional(),
    OCR_LANG_PATH: z.string().min(1).optional(),
    AMOUNT_TOLERANCE: tolerance.optional(),
    NAME_CASE_SENSITIVE: flag.optional(),
    NAME_COLLAPSE_WHITESPACE: flag.optional(),
    NAME_STRIP_DIACRITICS: flag.optional(),
    NAME_IGNORE_PUNCTUATION: flag.optional(),
    INCLUDE_RAW_TEXT: flag.optional(),
  })
  .superRefine((env, ctx) => {
    if (env.AUTHORITY_MODE === 'fixture' && env.AUTHORITY_FIXTURE_PATH === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTHORITY_FIXTURE_PATH'],
        message: 'Required when AUTHORITY_MODE is "fixture"',
      });
    }
  });

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function withoutEmptyValues(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Build the validator configuration from environment variables, merged over
 * DEFAULT_VALIDATOR_CONFIG.
 *
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ AUTHORITY_TIMEOUT_MS: '5000', LOG_LEVEL: 'debug' });
 * config.authority.timeoutMs // 5000
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ValidatorConfig {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const values = parsed.data;
  const defaults = DEFAULT_VALIDATOR_CONFIG;

  const authority: Mutable<ValidatorConfig['authority']> = {
    mode: values.AUTHORITY_MODE ?? defaults.authority.mode,
    timeoutMs: values.AUTHORITY_TIMEOUT_MS ?? defaults.authority.timeoutMs,
    allowedHosts: values.AUTHORITY_ALLOWED_HOSTS ?? defaults.authority.allowedHosts,
  };
  if (values.AUTHORITY_FIXTURE_PATH !== undefined) {
    authority.fixturePath = values.AUTHORITY_FIXTURE_PATH;
  }

  const ocr: Mutable<ValidatorConfig['ocr']> = {
    languages: values.OCR_LANGUAGES ?? defaults.ocr.languages,
  };
  if (values.OCR_LANG_PATH !== undefined) {
    ocr.langPath = values.OCR_LANG_PATH;
  }

  const namePolicy = defaults.comparison.namePolicy;

  return {
    port: values.PORT ?? defaults.port,
    host: values.HOST ?? defaults.host,
    logLevel: values.LOG_LEVEL ?? defaults.logLevel,
    maxUploadBytes: values.MAX_UPLOAD_BYTES ?? defaults.maxUploadBytes,
    authority,
    ocr,
    comparison: {
      amountTolerance: values.AMOUNT_TOLERANCE ?? defaults.comparison.amountTolerance,
      namePolicy: {
        caseSensitive: values.NAME_CASE_SENSITIVE ?? namePolicy.caseSensitive,
        collapseWhitespace: values.NAME_COLLAPSE_WHITESPACE ?? namePolicy.collapseWhitespace,
        stripDiacritics: values.NAME_STRIP_DIACRITICS ?? namePolicy.stripDiacritics,
        ignorePunctuation: values.NAME_IGNORE_PUNCTUATION ?? namePolicy.ignorePunctuation,
      },
    },
    includeRawText: values.INCLUDE_RAW_TEXT ?? defaults.includeRawText,
  };
}
