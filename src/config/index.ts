/**
 * Application Configuration
 * Parses environment variables once at start-up.
 */

import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  SUPABASE_URL: nonEmpty.url(),
  SUPABASE_SERVICE_KEY: nonEmpty,
  NETWORK_DOMAIN: nonEmpty,
  NETWORK_ADMIN_EMAIL: z
    .string()
    .trim()
    .email()
    .optional()
    .or(z.literal('').transform(() => undefined)),
  SMTP_HOST: nonEmpty.default('localhost'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: nonEmpty.default('Site Requests <no-reply@localhost>'),
  ALLOWED_ORIGINS: z.string().optional(),
});

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface AppConfig {
  port: number;
  supabaseUrl: string;
  supabaseServiceKey: string;
  networkDomain: string;
  networkAdminEmail: string | null;
  smtp: SmtpConfig;
  allowedOrigins: string[];
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application config from an environment map
 * @throws ConfigError when a required variable is missing or malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const smtp: SmtpConfig = {
    host: vars.SMTP_HOST,
    port: vars.SMTP_PORT,
    secure: vars.SMTP_PORT === 465,
    from: vars.SMTP_FROM,
  };
  if (vars.SMTP_USER !== undefined && vars.SMTP_USER !== '') {
    smtp.user = vars.SMTP_USER;
  }
  if (vars.SMTP_PASS !== undefined && vars.SMTP_PASS !== '') {
    smtp.pass = vars.SMTP_PASS;
  }

  return {
    port: vars.PORT,
    supabaseUrl: vars.SUPABASE_URL,
    supabaseServiceKey: vars.SUPABASE_SERVICE_KEY,
    networkDomain: vars.NETWORK_DOMAIN,
    networkAdminEmail: vars.NETWORK_ADMIN_EMAIL ?? null,
    smtp,
    allowedOrigins: (vars.ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
  };
}
