import { z } from 'zod';
import { ConfigError } from './errors.ts';
import { DEFAULT_BATCH_SIZE } from './graph/statement-generator.ts';
import { LOG_LEVELS } from './logger.ts';

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NGQL_BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
});

export type Env = z.infer<typeof EnvSchema>;

export interface MapperConfig {
  logLevel: Env['LOG_LEVEL'];
  batchSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MapperConfig {
  const result = EnvSchema.safeParse({
    LOG_LEVEL: env['LOG_LEVEL'] || undefined,
    NGQL_BATCH_SIZE: env['NGQL_BATCH_SIZE'] || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    batchSize: result.data.NGQL_BATCH_SIZE,
  };
}
