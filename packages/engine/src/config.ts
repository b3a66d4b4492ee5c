/**
 * Engine options
 *
 * Plain-data options are validated by a zod schema that also holds the
 * defaults. The logger, environment map and clock are objects the schema
 * does not describe; they are passed through as given.
 */

import { createLogger, type Logger } from '@prompty/logger';
import { z } from 'zod';
import { ERROR_STRATEGIES, type ErrorStrategy } from './context';
import { ConfigurationError } from './errors';
import { DEFAULT_DELIMITERS, type Delimiters } from './lexer/lexer';

export const DEFAULT_LIMITS = Object.freeze({
  maxDepth: 10,
  maxLoopIterations: 10_000,
  /** UTF-8 bytes */
  maxOutputSize: 10 * 1024 * 1024,
  /** Milliseconds */
  executionTimeout: 30_000,
  resolverTimeout: 5_000,
  functionTimeout: 1_000,
});

export type Limits = { [K in keyof typeof DEFAULT_LIMITS]: number };

const delimitersSchema = z
  .object({
    open: z.string().min(1, 'Open delimiter must not be empty'),
    close: z.string().min(1, 'Close delimiter must not be empty'),
  })
  .refine((delimiters) => delimiters.open !== delimiters.close, {
    message: 'Open and close delimiters must differ',
  })
  .refine((delimiters) => !/\s/.test(delimiters.open + delimiters.close), {
    message: 'Delimiters must not contain whitespace',
  });

const positiveInt = z.number().int().positive();
const milliseconds = z.number().positive();

export const EngineOptionsSchema = z.object({
  delimiters: delimitersSchema.default({ ...DEFAULT_DELIMITERS }),
  errorStrategy: z.enum(ERROR_STRATEGIES).default('throw'),
  maxDepth: positiveInt.default(DEFAULT_LIMITS.maxDepth),
  maxLoopIterations: positiveInt.default(DEFAULT_LIMITS.maxLoopIterations),
  maxOutputSize: positiveInt.default(DEFAULT_LIMITS.maxOutputSize),
  executionTimeout: milliseconds.default(DEFAULT_LIMITS.executionTimeout),
  resolverTimeout: milliseconds.default(DEFAULT_LIMITS.resolverTimeout),
  functionTimeout: milliseconds.default(DEFAULT_LIMITS.functionTimeout),
});

export type EngineOptions = z.input<typeof EngineOptionsSchema> & {
  logger?: Logger;
  /** Variables read by `prompty.env`; defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>;
  /** Millisecond clock used for timeouts */
  clock?: () => number;
};

export interface EngineConfig extends Limits {
  readonly delimiters: Readonly<Delimiters>;
  readonly errorStrategy: ErrorStrategy;
  readonly logger: Logger;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly clock: () => number;
}

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigurationError} Listing every rejected option
 */
export function resolveEngineOptions(options: EngineOptions = {}): Readonly<EngineConfig> {
  const { logger, env, clock, ...plain } = options;
  const result = EngineOptionsSchema.safeParse(plain);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return Object.freeze({
    ...result.data,
    delimiters: Object.freeze({ ...result.data.delimiters }),
    logger: logger ?? createLogger({ consoleOnly: true, environment: 'production' }),
    env: env ?? process.env,
    clock: clock ?? Date.now,
  });
}
