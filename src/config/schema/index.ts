import { Type } from '@sinclair/typebox';

import { NODE_ENVIRONMENTS } from '../constants';
import { variantsSchema } from '../utils/schema.util';
import { apiClientSettingsSchema } from './api-client.schema';
import { loggerSchema } from './logger.schema';

export * from './api-client.schema';
export * from './env.schema';
export * from './logger.schema';

export const configSchema = Type.Object({
  environment: variantsSchema(NODE_ENVIRONMENTS),
  logger: loggerSchema,
  apiClient: apiClientSettingsSchema,
});
