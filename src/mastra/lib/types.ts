// ============================================================================
// DOMAIN SCHEMAS
// ============================================================================
// Shared shapes for the rebalancing engine. Every type is inferred from its
// zod schema so that workflow steps, tools and the advisor adapter validate
// against the same definitions.
// ============================================================================

import { z } from 'zod';

// ============================================================================
// MARKET DATA
// ============================================================================

export const quoteSchema = z.object({
  price: z.number(),
  changePct: z.number(),
  dividendYieldPct: z.number(),
  // null = no P/E available for this symbol
  peRatio: z.number().nullable(),
});

export type Quote = z.infer<typeof quoteSchema>;

export const quoteMapSchema = z.record(z.string(), quoteSchema);

export type QuoteMap = z.infer<typeof quoteMapSchema>;

// ============================================================================
// ALLOCATION POLICY
// ============================================================================

export const CATEGORIES = ['Stocks (US)', 'Stocks (Intl)', 'Bonds', 'Real Estate', 'Other'] as const;

export const categorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof categorySchema>;

export function isCategory(value: string): value is Category {
  return categorySchema.safeParse(value).success;
}

/**
 * Category → target percentage. Values are relative weights and need not sum
 * to 100; key order is the order buy allocation walks the categories.
 */
export type TargetAllocation = Partial<Record<Category, number>>;

export const targetAllocationSchema = z.record(categorySchema, z.number().nonnegative());

export function allocationEntries(allocation: TargetAllocation): Array<[Category, number]> {
  const entries: Array<[Category, number]> = [];
  for (const [key, value] of Object.entries(allocation)) {
    if (isCategory(key) && value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}

// ============================================================================
// MARKET SUMMARY
// ============================================================================

export const sentimentSchema = z.enum(['bullish', 'neutral', 'bearish']);
export const riskLevelSchema = z.enum(['low', 'medium', 'high']);
export const marketRecommendationSchema = z.enum([
  'aggressive_buy',
  'balanced',
  'defensive',
  'proceed_with_caution',
]);
export const sectorSentimentSchema = z.enum(['strong', 'neutral', 'weak']);

export type Sentiment = z.infer<typeof sentimentSchema>;
export type RiskLevel = z.infer<typeof riskLevelSchema>;
export type MarketRecommendation = z.infer<typeof marketRecommendationSchema>;
export type SectorSentiment = z.infer<typeof sectorSentimentSchema>;

export const sectorPerformanceSchema = z.object({
  performance: z.number(),
  dividendYield: z.number(),
  sentiment: sectorSentimentSchema,
});

export type SectorPerformance = z.infer<typeof sectorPerformanceSchema>;

export const marketSummarySchema = z.object({
  sentiment: sentimentSchema,
  risk: riskLevelSchema,
  recommendation: marketRecommendationSchema,
  sectorAnalysis: z.record(z.string(), sectorPerformanceSchema),
  insights: z.array(z.string()),
});

export type MarketSummary = z.infer<typeof marketSummarySchema>;

// ============================================================================
// RECOMMENDATIONS
// ============================================================================

export const tradeActionSchema = z.enum(['BUY', 'SELL']);
export const prioritySchema = z.enum(['High', 'Medium', 'Low']);
export const recommendationSourceSchema = z.enum(['algorithmic', 'advisor']);

export type TradeAction = z.infer<typeof tradeActionSchema>;
export type Priority = z.infer<typeof prioritySchema>;
export type RecommendationSource = z.infer<typeof recommendationSourceSchema>;

export const recommendationSchema = z.object({
  symbol: z.string(),
  shares: z.number().int().positive(),
  price: z.number(),
  cost: z.number(),
  category: categorySchema,
  action: tradeActionSchema,
  reasoning: z.string(),
  detailedReasons: z.array(z.string()),
  priority: prioritySchema,
  source: recommendationSourceSchema,
  score: z.number(),
});

export type Recommendation = z.infer<typeof recommendationSchema>;

// ============================================================================
// PORTFOLIO STATE
// ============================================================================

export const holdingSchema = z.object({
  symbol: z.string(),
  shares: z.number().int().nonnegative(),
});

export type Holding = z.infer<typeof holdingSchema>;

export type HoldingMap = Record<string, Holding>;

export const executionLogEntrySchema = z.object({
  timestamp: z.string(),
  action: z.enum(['BUY', 'SELL', 'DEPOSIT']),
  symbol: z.string().nullable(),
  shares: z.number().int().nonnegative(),
  description: z.string(),
  amount: z.number(),
});

export type ExecutionLogEntry = z.infer<typeof executionLogEntrySchema>;

export interface PortfolioState {
  holdings: HoldingMap;
  cashBalance: number;
  executionLog: ExecutionLogEntry[];
}
