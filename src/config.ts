import { z } from 'zod';

export const configSchema = z.object({
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  logName: z.string().min(1).default('bipipe'),
});

export type Config = z.infer<typeof configSchema>;

const isTestEnvironment = (env: NodeJS.ProcessEnv): boolean =>
  env.NODE_ENV === 'test' || env.VITEST === 'true';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env.BIPIPE_LOG_LEVEL || (isTestEnvironment(env) ? 'silent' : undefined),
    logName: env.BIPIPE_LOG_NAME || undefined,
  });
}
