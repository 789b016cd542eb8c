// ============================================================================
// REBALANCE WORKFLOW
// ============================================================================
// One decision cycle for a portfolio supplied as input:
//
// PIPELINE:
// 1. Fetch Market Data - Quotes for the research universe plus holdings
// 2. Analyze Market - Sentiment, risk, sector performance, stance
// 3. Generate Recommendations - Advisor if configured, deterministic fallback
// 4. Apply Recommendations - Optional; returns the post-trade state
//
// INPUT: Holdings, cash, optional target allocation and config
// OUTPUT: Ordered recommendations plus pre/post account state
// ============================================================================

import { createStep, createWorkflow } from '@mastra/core/workflows';
import { z } from 'zod';

import { createAgentOracle } from '../agents/advisor-agent';
import {
  DEFAULT_CONFIG,
  RESEARCH_SYMBOLS,
  SECTORS,
  TARGET_ALLOCATION,
  isAdvisorConfigured,
  resolveConfig,
  toHoldingMap,
} from '../config';
import { TtlCache } from '../lib/cache';
import { applyRecommendations } from '../lib/executor';
import { accountSummary, createPortfolioState } from '../lib/portfolio';
import { allCaches, createCycleCaches, planRecommendations } from '../lib/session';
import {
  executionLogEntrySchema,
  holdingSchema,
  marketSummarySchema,
  quoteMapSchema,
  recommendationSchema,
  recommendationSourceSchema,
  targetAllocationSchema,
} from '../lib/types';
import { analyzeMarket } from '../tools/market-tools';

// Shared across runs; cleared after every executed batch
const caches = createCycleCaches(DEFAULT_CONFIG.cacheTtlSeconds * 1000);

// ============================================================================
// SCHEMAS
// ============================================================================

const workflowConfigSchema = z.object({
  useAdvisor: z.boolean().default(true),
  execute: z.boolean().default(false),
  fallbackStrategy: z.enum(['rebalance', 'diversified']).default('rebalance'),
});

const rebalanceInputSchema = z.object({
  holdings: z.array(holdingSchema),
  cash: z.number().nonnegative(),
  targetAllocation: targetAllocationSchema.optional(),
  config: workflowConfigSchema.optional(),
});

const accountSchema = z.object({
  holdingsValue: z.number(),
  cash: z.number(),
  totalValue: z.number(),
  uninvestedPct: z.number(),
});

const marketDataSchema = rebalanceInputSchema.extend({
  quotes: quoteMapSchema,
  warnings: z.array(z.string()),
});

const marketAnalysisSchema = marketDataSchema.extend({
  market: marketSummarySchema,
});

const recommendationsSchema = marketAnalysisSchema.extend({
  recommendations: z.array(recommendationSchema),
  source: recommendationSourceSchema,
  advisorAnalysis: z.string().nullable(),
});

const rejectionSchema = z.object({
  code: z.enum(['INSUFFICIENT_FUNDS', 'INSUFFICIENT_SHARES']),
  symbol: z.string(),
  message: z.string(),
});

export const rebalanceOutputSchema = z.object({
  market: marketSummarySchema,
  warnings: z.array(z.string()),
  recommendations: z.array(recommendationSchema),
  source: recommendationSourceSchema,
  advisorAnalysis: z.string().nullable(),
  preRebalance: accountSchema,
  execution: z
    .object({
      totalInvested: z.number(),
      totalSold: z.number(),
      rejections: z.array(rejectionSchema),
      holdings: z.array(holdingSchema),
      log: z.array(executionLogEntrySchema),
      postRebalance: accountSchema,
    })
    .nullable(),
});

export type RebalanceOutput = z.infer<typeof rebalanceOutputSchema>;

// ============================================================================
// STEP 1: FETCH MARKET DATA
// ============================================================================

const fetchMarketDataStep = createStep({
  id: 'fetch-market-data',
  description: 'Fetch quotes for the research universe and every held symbol',
  inputSchema: rebalanceInputSchema,
  outputSchema: marketDataSchema,

  execute: async ({ inputData }) => {
    const symbols = Array.from(new Set([...RESEARCH_SYMBOLS, ...inputData.holdings.map((h) => h.symbol)]));
    const { quotes, warnings } = await caches.quotes.fetch(symbols);

    return { ...inputData, quotes, warnings };
  },
});

// ============================================================================
// STEP 2: ANALYZE MARKET
// ============================================================================

const analyzeMarketStep = createStep({
  id: 'analyze-market',
  description: 'Summarize market sentiment, risk and sector performance',
  inputSchema: marketDataSchema,
  outputSchema: marketAnalysisSchema,

  execute: async ({ inputData }) => {
    const { quotes } = inputData;
    const market = await caches.market.getOrCompute(TtlCache.key('analyzeMarket', Object.keys(quotes)), async () =>
      analyzeMarket(quotes, SECTORS),
    );
    return { ...inputData, market };
  },
});

// ============================================================================
// STEP 3: GENERATE RECOMMENDATIONS
// ============================================================================

const generateRecommendationsStep = createStep({
  id: 'generate-recommendations',
  description: 'Ask the advisor for a plan and fall back to the deterministic engine when it has none',
  inputSchema: marketAnalysisSchema,
  outputSchema: recommendationsSchema,

  execute: async ({ inputData }) => {
    const { quotes, market, cash } = inputData;
    const workflowConfig = workflowConfigSchema.parse(inputData.config ?? {});

    const plan = await planRecommendations({
      quotes,
      market,
      holdings: toHoldingMap(inputData.holdings),
      cash,
      targetAllocation: inputData.targetAllocation ?? TARGET_ALLOCATION,
      config: resolveConfig({ fallbackStrategy: workflowConfig.fallbackStrategy }),
      oracle: workflowConfig.useAdvisor && isAdvisorConfigured() ? createAgentOracle() : null,
      adviceCache: caches.advice,
    });

    return {
      ...inputData,
      recommendations: plan.recommendations,
      source: plan.source,
      advisorAnalysis: plan.advice?.analysis ?? null,
    };
  },
});

// ============================================================================
// STEP 4: APPLY RECOMMENDATIONS
// ============================================================================

const applyRecommendationsStep = createStep({
  id: 'apply-recommendations',
  description: 'Optionally apply the plan to a copy of the supplied portfolio',
  inputSchema: recommendationsSchema,
  outputSchema: rebalanceOutputSchema,

  execute: async ({ inputData }) => {
    const { quotes, market, warnings, recommendations, source, advisorAnalysis } = inputData;
    const config = workflowConfigSchema.parse(inputData.config ?? {});

    const state = createPortfolioState(inputData.cash, inputData.holdings);
    const preRebalance = accountSummary(state, quotes);

    let execution: RebalanceOutput['execution'] = null;
    if (config.execute) {
      const result = applyRecommendations(recommendations, state, { invalidate: allCaches(caches) });
      execution = {
        totalInvested: result.totalInvested,
        totalSold: result.totalSold,
        rejections: result.rejections.map((rejection) => ({
          code: rejection.code,
          symbol: rejection.recommendation.symbol,
          message: rejection.message,
        })),
        holdings: Object.values(state.holdings),
        log: state.executionLog,
        postRebalance: accountSummary(state, quotes),
      };
    }

    return {
      market,
      warnings,
      recommendations,
      source,
      advisorAnalysis,
      preRebalance,
      execution,
    };
  },
});

// ============================================================================
// WORKFLOW DEFINITION
// ============================================================================

export const rebalanceWorkflow = createWorkflow({
  id: 'rebalance-workflow',
  inputSchema: rebalanceInputSchema,
  outputSchema: rebalanceOutputSchema,
})
  .then(fetchMarketDataStep)
  .then(analyzeMarketStep)
  .then(generateRecommendationsStep)
  .then(applyRecommendationsStep);

rebalanceWorkflow.commit();
