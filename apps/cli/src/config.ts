import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const DEFAULT_LEDGER_FILE = 'transactions.txt';

const EnvSchema = z.object({
  LEDGER_FILE: z.string().trim().min(1, 'must not be empty').default(DEFAULT_LEDGER_FILE),
  LEDGER_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
    .toUpperCase()
    .default('USD'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type CliConfig = {
  ledgerFile: string;
  currency: string;
  logLevel: (typeof LOG_LEVELS)[number];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read CLI configuration from the environment.
 * A positional argument overrides LEDGER_FILE.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv, args: readonly string[] = []): CliConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigError(`Invalid configuration: ${errors}`);
  }

  const fileArgument = args.find((arg) => !arg.startsWith('-'));

  return {
    ledgerFile: fileArgument ?? result.data.LEDGER_FILE,
    currency: result.data.LEDGER_CURRENCY,
    logLevel: result.data.LOG_LEVEL,
  };
}
