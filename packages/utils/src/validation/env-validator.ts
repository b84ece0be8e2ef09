import { EnvConfigSchema, type EnvConfig } from '@streamgate/schemas';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on application startup.
 *
 * @param env - Variables to validate (defaults to process.env)
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (result.success) {
    logger.info({ venue: result.data.STREAM_VENUE }, 'Environment variables validated');
    return result.data;
  }

  logger.error('Invalid environment variables:');
  for (const issue of result.error.issues) {
    logger.error({ path: issue.path.join('.'), err: issue.message });
  }
  logger.error(
    'Please ensure all required environment variables are set. See documentation for details.'
  );
  process.exit(1);
}
