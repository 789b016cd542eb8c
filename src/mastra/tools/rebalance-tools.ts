// ============================================================================
// REBALANCE TOOLS
// ============================================================================
// Deterministic rebalancing engine. Used directly when no advisor is
// configured and as the fallback whenever the advisor returns nothing usable.
//
// PIPELINE:
// 1. Overlay the market stance on the target allocation
// 2. Evaluate one primary ETF per category for trimming
// 3. Pool cash on hand with sale proceeds
// 4. Allocate the pool across categories (last category takes the remainder)
// 5. Order by cost descending; equal costs keep sells ahead of buys
// ============================================================================

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { CATEGORY_SECTORS, DEFAULT_CONFIG, DIVERSIFIED_ETFS, PRIMARY_ETFS, toHoldingMap } from '../config';
import { valuePortfolio } from '../lib/portfolio';
import {
  allocationEntries,
  holdingSchema,
  marketSummarySchema,
  quoteMapSchema,
  recommendationSchema,
  targetAllocationSchema,
  type Category,
  type HoldingMap,
  type MarketRecommendation,
  type MarketSummary,
  type Priority,
  type QuoteMap,
  type Recommendation,
  type TargetAllocation,
} from '../lib/types';
import { explainAction, sectorFor } from './reasoning-tools';
import { scoreSymbol } from './scoring-tools';

// ============================================================================
// TYPES
// ============================================================================

export interface RebalancePolicy {
  primaryEtfs: Partial<Record<Category, string>>;
  categorySectors: Partial<Record<Category, string>>;
  overweightBandPct: number;
  sellFraction: number;
  highRiskSellFraction: number;
}

export const DEFAULT_POLICY: RebalancePolicy = {
  primaryEtfs: PRIMARY_ETFS,
  categorySectors: CATEGORY_SECTORS,
  overweightBandPct: DEFAULT_CONFIG.overweightBandPct,
  sellFraction: DEFAULT_CONFIG.sellFraction,
  highRiskSellFraction: DEFAULT_CONFIG.highRiskSellFraction,
};

export interface RebalanceInput {
  holdings: HoldingMap;
  targetAllocation: TargetAllocation;
  market: MarketSummary;
  quotes: QuoteMap;
  cashAvailable: number;
  policy?: Partial<RebalancePolicy>;
}

// ============================================================================
// STEP 1: MARKET OVERLAY
// ============================================================================

export function adjustTargetAllocation(target: TargetAllocation, stance: MarketRecommendation): TargetAllocation {
  const adjusted: TargetAllocation = { ...target };
  const us = target['Stocks (US)'];
  const bonds = target.Bonds;

  if (stance === 'aggressive_buy') {
    if (us !== undefined) adjusted['Stocks (US)'] = Math.min(70, us + 10);
    if (bonds !== undefined) adjusted.Bonds = Math.max(5, bonds - 10);
  } else if (stance === 'defensive') {
    if (bonds !== undefined) adjusted.Bonds = Math.min(30, bonds + 15);
    if (us !== undefined) adjusted['Stocks (US)'] = Math.max(40, us - 15);
  }

  return adjusted;
}

function hasPrice(quotes: QuoteMap, symbol: string): boolean {
  const quote = quotes[symbol];
  return quote !== undefined && quote.price > 0;
}

// ============================================================================
// STEP 2: SELL EVALUATION
// ============================================================================

interface SellContext {
  holdings: HoldingMap;
  quotes: QuoteMap;
  market: MarketSummary;
  breakdown: Partial<Record<Category, number>>;
  totalAvailable: number;
  policy: RebalancePolicy;
}

function evaluateSell(category: Category, targetPct: number, ctx: SellContext): Recommendation | null {
  const { holdings, quotes, market, breakdown, totalAvailable, policy } = ctx;

  const symbol = policy.primaryEtfs[category];
  if (!symbol || !hasPrice(quotes, symbol)) return null;

  const holding = holdings[symbol];
  if (!holding || holding.shares <= 0) return null;

  const quote = quotes[symbol];
  const currentPct = totalAvailable > 0 ? ((breakdown[category] ?? 0) / totalAvailable) * 100 : 0;
  const sectorSentiment = sectorFor(category, market, policy.categorySectors).sentiment;

  const reasons: string[] = [];
  const overweight = currentPct > targetPct + policy.overweightBandPct;

  if (overweight) {
    reasons.push(`Portfolio overweight by ${(currentPct - targetPct).toFixed(1)}% - rebalancing needed`);
  }
  if (quote.changePct < -3) {
    reasons.push(`Poor performance (${quote.changePct.toFixed(1)}%) - cutting losses`);
  }
  if (quote.peRatio !== null && quote.peRatio > 30) {
    reasons.push(`Overvalued (PE ${quote.peRatio.toFixed(1)}) - profit taking`);
  }
  if (sectorSentiment === 'weak' && currentPct > 5) {
    reasons.push('Weak sector sentiment - reducing exposure');
  }
  if (market.risk === 'high' && currentPct > 15) {
    reasons.push('High volatility environment - reducing risk exposure');
  }

  if (reasons.length === 0) return null;

  let shares: number;
  if (overweight) {
    shares = Math.floor((((currentPct - targetPct) / 100) * totalAvailable) / quote.price);
  } else {
    const fraction = market.risk === 'high' ? policy.highRiskSellFraction : policy.sellFraction;
    shares = Math.floor(holding.shares * fraction);
  }
  shares = Math.max(1, Math.min(shares, holding.shares));

  return {
    symbol,
    shares,
    price: quote.price,
    cost: shares * quote.price,
    category,
    action: 'SELL',
    reasoning: `Sell ${shares} shares of ${symbol} - ${reasons.join(', ')}`,
    detailedReasons: explainAction(category, market, quote, 'SELL', policy.categorySectors),
    priority: overweight ? 'High' : 'Medium',
    source: 'algorithmic',
    score: scoreSymbol(quote),
  };
}

// ============================================================================
// STEP 4: BUY ALLOCATION
// ============================================================================

function buyPriority(currentPct: number, targetPct: number, bandPct: number): Priority {
  if (currentPct < targetPct - bandPct) return 'High';
  if (currentPct >= targetPct) return 'Low';
  return 'Medium';
}

// ============================================================================
// ENGINE
// ============================================================================

export function byCostDescending(recommendations: Recommendation[]): Recommendation[] {
  // Array.prototype.sort is stable, so equal costs keep emission order
  return [...recommendations].sort((a, b) => b.cost - a.cost);
}

export function rebalance(input: RebalanceInput): Recommendation[] {
  const { holdings, market, quotes, cashAvailable } = input;
  const policy: RebalancePolicy = { ...DEFAULT_POLICY, ...input.policy };

  const adjusted = allocationEntries(adjustTargetAllocation(input.targetAllocation, market.recommendation));

  const { holdingsValue, breakdown } = valuePortfolio(holdings, quotes);
  const totalAvailable = holdingsValue + cashAvailable;

  const sells: Recommendation[] = [];
  for (const [category, targetPct] of adjusted) {
    const sell = evaluateSell(category, targetPct, { holdings, quotes, market, breakdown, totalAvailable, policy });
    if (sell) sells.push(sell);
  }

  const totalCash = cashAvailable + sells.reduce((sum, sell) => sum + sell.cost, 0);
  let remainingCash = totalCash;

  const buys: Recommendation[] = [];
  adjusted.forEach(([category, targetPct], index) => {
    const symbol = policy.primaryEtfs[category];
    if (!symbol || !hasPrice(quotes, symbol)) return;

    const quote = quotes[symbol];
    const isLast = index === adjusted.length - 1;

    const shares = isLast
      ? Math.floor(remainingCash / quote.price)
      : Math.floor((totalCash * (targetPct / 100)) / quote.price);
    const cost = shares * quote.price;

    if (!isLast) remainingCash -= cost;
    if (shares <= 0) return;

    const sentiment = sectorFor(category, market, policy.categorySectors).sentiment;
    const currentPct = totalAvailable > 0 ? ((breakdown[category] ?? 0) / totalAvailable) * 100 : 0;

    buys.push({
      symbol,
      shares,
      price: quote.price,
      cost,
      category,
      action: 'BUY',
      reasoning: `Market-adjusted allocation: ${targetPct}% in ${category} (Market: ${sentiment})`,
      detailedReasons: explainAction(category, market, quote, 'BUY', policy.categorySectors),
      priority: buyPriority(currentPct, targetPct, policy.overweightBandPct),
      source: 'algorithmic',
      score: scoreSymbol(quote),
    });
  });

  return byCostDescending([...sells, ...buys]);
}

// ============================================================================
// DIVERSIFIED ALLOCATION
// ============================================================================

/**
 * Pick the best day performer among a category's candidates, falling back to
 * the first candidate when none has a quote.
 */
export function bestPerformer(candidates: string[], quotes: QuoteMap): string | null {
  let best: string | null = null;
  let bestChange = Number.NEGATIVE_INFINITY;

  for (const symbol of candidates) {
    const quote = quotes[symbol];
    if (quote && quote.changePct > bestChange) {
      bestChange = quote.changePct;
      best = symbol;
    }
  }

  return best ?? candidates[0] ?? null;
}

export function diversify(
  cashAvailable: number,
  targetAllocation: TargetAllocation,
  quotes: QuoteMap,
  market: MarketSummary,
  candidates: Partial<Record<Category, string[]>> = DIVERSIFIED_ETFS,
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  let remainingCash = cashAvailable;

  for (const [category, targetPct] of allocationEntries(targetAllocation)) {
    const symbol = bestPerformer(candidates[category] ?? [], quotes);
    if (!symbol || !hasPrice(quotes, symbol)) continue;

    const quote = quotes[symbol];
    const shares = Math.floor((remainingCash * (targetPct / 100)) / quote.price);
    if (shares <= 0) continue;

    const cost = shares * quote.price;
    remainingCash -= cost;

    recommendations.push({
      symbol,
      shares,
      price: quote.price,
      cost,
      category,
      action: 'BUY',
      reasoning: `Diversified allocation: ${targetPct}% in ${category} (Best performer: ${symbol})`,
      detailedReasons: explainAction(category, market, quote, 'BUY'),
      priority: 'Medium',
      source: 'algorithmic',
      score: scoreSymbol(quote),
    });
  }

  return recommendations;
}

// ============================================================================
// TOOL
// ============================================================================

export const rebalanceTool = createTool({
  id: 'rebalance-portfolio',
  description:
    'Compute deterministic buy/sell recommendations that move holdings toward a target allocation under current market conditions',
  inputSchema: z.object({
    holdings: z.array(holdingSchema),
    targetAllocation: targetAllocationSchema,
    market: marketSummarySchema,
    quotes: quoteMapSchema,
    cashAvailable: z.number().nonnegative(),
  }),
  outputSchema: z.object({
    recommendations: z.array(recommendationSchema),
  }),
  execute: async ({ context }) => {
    return {
      recommendations: rebalance({
        holdings: toHoldingMap(context.holdings),
        targetAllocation: context.targetAllocation,
        market: context.market,
        quotes: context.quotes,
        cashAvailable: context.cashAvailable,
      }),
    };
  },
});
