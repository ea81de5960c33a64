import { Value } from '@sinclair/typebox/value';

import { envValidationSchema } from '../schema';
import { Config } from '../types';
import { handleValidationError } from '../utils/validation-error.util';

export function envLoader(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const parsedEnvs = Value.Parse(envValidationSchema, env);

    return {
      environment: parsedEnvs.NODE_ENV,
      logger: {
        level: parsedEnvs.LOGGER_LEVEL,
        isPrettyEnabled: parsedEnvs.LOGGER_PRETTY_ENABLED,
      },
      apiClient: {
        requestsPerSecond: parsedEnvs.API_CLIENT_REQUESTS_PER_SECOND,
        timeoutMs: parsedEnvs.API_CLIENT_TIMEOUT_MS,
        baseUrl: parsedEnvs.API_CLIENT_BASE_URL || undefined,
        apiKeyName: parsedEnvs.API_CLIENT_KEY_NAME,
        apiKeyValue: parsedEnvs.API_CLIENT_KEY_VALUE || undefined,
        proxyUrl: parsedEnvs.API_CLIENT_PROXY_URL || undefined,
      },
    };
  } catch (error) {
    handleValidationError(error, 'Failed to load environment variables');
  }
}
