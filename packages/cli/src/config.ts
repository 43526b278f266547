import { z } from 'zod';
import type { SourceConfig } from './types';

/**
 * Environment variable validation schema
 * Lets the source paths and the login history command be pointed elsewhere
 */
export const envSchema = z.object({
  USERSCOPE_PASSWD_FILE: z.string().min(1).default('/etc/passwd'),
  USERSCOPE_GROUP_FILE: z.string().min(1).default('/etc/group'),
  USERSCOPE_SUDOERS_FILE: z.string().min(1).default('/etc/sudoers'),
  USERSCOPE_DEFS_FILE: z.string().min(1).default('/etc/login.defs'),
  USERSCOPE_WTMP_FILE: z.string().min(1).default('/var/log/wtmp'),

  // Login history query
  USERSCOPE_LAST_COMMAND: z.string().min(1).default('last'),
  USERSCOPE_LAST_TIMEOUT_MS: z.coerce.number().int().min(100).max(600000).default(10000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Environment validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the environment and maps it onto the source locations.
 * Throws ConfigError listing every invalid variable.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): SourceConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return toSourceConfig(result.data);
}

export function toSourceConfig(env: EnvConfig): SourceConfig {
  return {
    passwdFile: env.USERSCOPE_PASSWD_FILE,
    groupFile: env.USERSCOPE_GROUP_FILE,
    sudoersFile: env.USERSCOPE_SUDOERS_FILE,
    defsFile: env.USERSCOPE_DEFS_FILE,
    wtmpFile: env.USERSCOPE_WTMP_FILE,
    lastCommand: env.USERSCOPE_LAST_COMMAND,
    lastTimeoutMs: env.USERSCOPE_LAST_TIMEOUT_MS,
  };
}
