import { Mastra } from '@mastra/core/mastra';

import { portfolioAdvisor } from './agents/advisor-agent';
import { logger } from './logger';
import { rebalanceWorkflow } from './workflows/rebalance-workflow';

export const mastra = new Mastra({
  workflows: {
    rebalanceWorkflow,
  },
  agents: {
    portfolioAdvisor,
  },
  logger,
});
