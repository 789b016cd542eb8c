import { PinoLogger } from '@mastra/loggers';

import { env } from './config';

export const logger = new PinoLogger({
  name: 'Rebalancer',
  level: env.LOG_LEVEL,
});
