import { Static } from '@sinclair/typebox';

import { configSchema } from './schema';

export type Config = Static<typeof configSchema>;
