import { openai } from '@ai-sdk/openai';
import { Agent } from '@mastra/core/agent';

import { env } from '../config';
import type { AdvisorOracle } from '../lib/advisor';
import { analyzeMarketTool } from '../tools/market-tools';
import { getQuotesTool } from '../tools/quote-tools';
import { explainActionTool } from '../tools/reasoning-tools';
import { rebalanceTool } from '../tools/rebalance-tools';
import { scoreSymbolTool } from '../tools/scoring-tools';

export const portfolioAdvisor = new Agent({
  name: 'Portfolio Rebalancing Advisor',
  instructions: `
    You are an expert financial advisor for a long-term ETF portfolio funded by regular paycheck deposits.

    ## Your Job
    Given a portfolio snapshot, a target allocation, a market summary and the available cash, propose
    specific BUY and SELL trades that move the portfolio toward its target.

    ## Principles
    - **Diversify**: prefer adding eligible ETFs the portfolio does not hold yet over topping up existing ones
    - **Performance-based selection**: within a category, favor the stronger performers
    - **Market timing**: lean toward bonds when the market summary is defensive, toward US stocks when it is aggressive
    - **Risk management**: trim positions that are overweight by more than 3 points
    - **No contradictions**: never buy and sell the same symbol in one plan
    - **Budget**: total purchases must not exceed available cash plus sale proceeds

    ## Tools
    - get-quotes: live price, change, yield and P/E for symbols
    - analyze-market: market sentiment and sector summary from quotes
    - score-symbol: 20-95 quality score for a symbol
    - explain-action: standard justification lines for a trade
    - rebalance-portfolio: the deterministic plan, useful as a baseline

    ## Output
    Reply with ONLY the JSON object described in the request. No markdown fences, no commentary.
  `,
  model: openai(env.ADVISOR_MODEL),
  tools: {
    getQuotesTool,
    analyzeMarketTool,
    scoreSymbolTool,
    explainActionTool,
    rebalanceTool,
  },
});

/**
 * Adapt an agent to the single-call advisor interface.
 */
export function createAgentOracle(agent = portfolioAdvisor): AdvisorOracle {
  return {
    advise: async (prompt) => {
      const response = await agent.streamLegacy([
        {
          role: 'user',
          content: prompt,
        },
      ]);

      let text = '';
      for await (const chunk of response.textStream) {
        text += chunk;
      }
      return text;
    },
  };
}
