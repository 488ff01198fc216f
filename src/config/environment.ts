import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { LogLevel } from '../utils/logger';

export const DEFAULT_TIMEZONE = 'America/Los_Angeles';

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

const environmentSchema = z.object({
  SMS_MAILDIR: z.string().trim().min(1).optional(),
  SMS_EXPORT_DIR: z.string().trim().min(1).optional(),
  SMS_TIMEZONE: z
    .string()
    .trim()
    .default(DEFAULT_TIMEZONE)
    .refine(isValidTimezone, value => ({ message: `unknown timezone '${value}'` })),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .default(LogLevel.WARN)
    .pipe(z.nativeEnum(LogLevel))
});

// `KEY=` in a .env file means unset
const present = (value?: string): string | undefined => (value && value.trim() ? value : undefined);

export interface EnvironmentConfig {
  maildir?: string;
  exportDir?: string;
  timezone: string;
  logLevel: LogLevel;
}

/**
 * Values that take precedence over the environment, e.g. command line flags.
 */
export type ConfigOverrides = Partial<Record<keyof EnvironmentConfig, string>>;

export const initializeEnvironment = (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig => {
  const parsed = environmentSchema.safeParse({
    SMS_MAILDIR: overrides.maildir ?? present(env.SMS_MAILDIR),
    SMS_EXPORT_DIR: overrides.exportDir ?? present(env.SMS_EXPORT_DIR),
    SMS_TIMEZONE: overrides.timezone ?? present(env.SMS_TIMEZONE),
    LOG_LEVEL: overrides.logLevel ?? present(env.LOG_LEVEL)
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    maildir: parsed.data.SMS_MAILDIR,
    exportDir: parsed.data.SMS_EXPORT_DIR,
    timezone: parsed.data.SMS_TIMEZONE,
    logLevel: parsed.data.LOG_LEVEL
  };
};
