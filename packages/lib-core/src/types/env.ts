/**
 * Environment configuration
 *
 * Every setting the server reads from process.env, validated once at startup.
 */

import { z } from 'zod';
import { DEFAULT_LOGOUT_ENDPOINT_PATH } from '../constants';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from '../utils/logger';
import { ConfigurationError } from '../utils/errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const endpointPaths = z
  .string()
  .default(DEFAULT_LOGOUT_ENDPOINT_PATH)
  .transform((value) =>
    value
      .split(',')
      .map((path) => path.trim())
      .filter((path) => path.length > 0)
  )
  .pipe(
    z
      .array(z.string().startsWith('/', { message: 'Endpoint paths must start with "/"' }))
      .min(1, { message: 'At least one logout endpoint path is required' })
  );

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LOGOUT_ENDPOINT_PATHS: endpointPaths,
  IGNORE_ENDPOINT_PERMISSIONS: booleanFlag,
  DEGRADED_MODE: booleanFlag,
  APPLICATIONS_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FORMAT: z.enum(LOG_FORMATS).default('json'),
});

export interface EnvConfig {
  port: number;
  endpointPaths: string[];
  ignoreEndpointPermissions: boolean;
  degradedMode: boolean;
  applicationsFile?: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

/**
 * Parse and validate the environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const data = result.data;
  return {
    port: data.PORT,
    endpointPaths: data.LOGOUT_ENDPOINT_PATHS,
    ignoreEndpointPermissions: data.IGNORE_ENDPOINT_PERMISSIONS,
    degradedMode: data.DEGRADED_MODE,
    ...(data.APPLICATIONS_FILE !== undefined && { applicationsFile: data.APPLICATIONS_FILE }),
    logLevel: data.LOG_LEVEL,
    logFormat: data.LOG_FORMAT,
  };
}

