// ============================================================================
// REASONING TOOLS
// ============================================================================
// Deterministic justification text for a proposed trade. Each ladder below
// yields exactly one fragment:
//
// BUY:  sector → momentum → dividend tier → market stance → risk   (5 lines)
// SELL: sector → momentum → valuation     → risk                   (4 lines)
// ============================================================================

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { CATEGORY_SECTORS } from '../config';
import {
  categorySchema,
  marketSummarySchema,
  quoteSchema,
  tradeActionSchema,
  type Category,
  type MarketSummary,
  type Quote,
  type SectorPerformance,
  type TradeAction,
} from '../lib/types';

const NEUTRAL_SECTOR: SectorPerformance = {
  performance: 0,
  dividendYield: 0,
  sentiment: 'neutral',
};

function pct(value: number): string {
  return value.toFixed(1);
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}`;
}

/**
 * Sector data backing a category, neutral when the category has no sector
 * or the sector had no quotes this cycle.
 */
export function sectorFor(
  category: Category,
  market: MarketSummary,
  categorySectors: Partial<Record<Category, string>> = CATEGORY_SECTORS,
): SectorPerformance {
  const sectorName = categorySectors[category];
  if (!sectorName) return NEUTRAL_SECTOR;
  return market.sectorAnalysis[sectorName] ?? NEUTRAL_SECTOR;
}

// ============================================================================
// BUY LADDERS
// ============================================================================

function buySectorReason({ performance, sentiment }: SectorPerformance): string {
  if (sentiment === 'strong' && performance > 1) {
    return `Strong sector momentum (+${pct(performance)}%) - favorable entry point`;
  }
  if (sentiment === 'weak' && performance < -1) {
    return `Weak sector performance (${pct(performance)}%) - potential value opportunity`;
  }
  return `Stable sector performance (${pct(performance)}%) - balanced risk/reward`;
}

function buyMomentumReason({ changePct }: Quote): string {
  if (changePct > 2) {
    return `Strong price momentum (+${pct(changePct)}%) - bullish trend`;
  }
  if (changePct < -2) {
    return `Price weakness (${pct(changePct)}%) - potential oversold opportunity`;
  }
  return `Stable price action (${signed(changePct)}%) - steady performance`;
}

function dividendReason({ dividendYieldPct }: Quote): string {
  if (dividendYieldPct > 3) {
    return `Attractive dividend yield (${pct(dividendYieldPct)}%) - income generation`;
  }
  if (dividendYieldPct > 1) {
    return `Modest dividend yield (${pct(dividendYieldPct)}%) - some income`;
  }
  return `Growth-focused (low dividend ${pct(dividendYieldPct)}%) - capital appreciation`;
}

function marketStanceReason({ recommendation }: MarketSummary): string {
  if (recommendation === 'aggressive_buy') {
    return 'Market conditions favor growth - aggressive positioning';
  }
  if (recommendation === 'defensive') {
    return 'Defensive market conditions - capital preservation focus';
  }
  return 'Balanced market approach - diversified allocation';
}

function buyRiskReason({ risk }: MarketSummary): string {
  if (risk === 'low') return 'Low volatility environment - stable investment climate';
  if (risk === 'high') return 'High volatility detected - cautious positioning';
  return 'Moderate risk environment - standard allocation';
}

// ============================================================================
// SELL LADDERS
// ============================================================================

function sellSectorReason({ performance, sentiment }: SectorPerformance): string {
  if (sentiment === 'weak' && performance < -1) {
    return `Poor sector performance (${pct(performance)}%) - reducing exposure`;
  }
  if (sentiment === 'strong' && performance > 2) {
    return `Strong sector performance (${pct(performance)}%) - profit taking opportunity`;
  }
  return `Mixed sector signals (${pct(performance)}%) - strategic rebalancing`;
}

function sellMomentumReason({ changePct }: Quote): string {
  if (changePct < -3) {
    return `Significant price decline (${pct(changePct)}%) - cutting losses`;
  }
  if (changePct > 5) {
    return `Strong gains (${pct(changePct)}%) - taking profits`;
  }
  return `Moderate price action (${signed(changePct)}%) - portfolio rebalancing`;
}

function valuationReason({ peRatio }: Quote): string {
  if (peRatio === null) return 'Valuation unavailable - rebalancing decision';
  if (peRatio > 30) return `Overvalued (PE ${pct(peRatio)}) - profit taking`;
  if (peRatio < 10) return `Undervalued but poor fundamentals (PE ${pct(peRatio)}) - strategic exit`;
  return `Fair valuation (PE ${pct(peRatio)}) - rebalancing decision`;
}

function sellRiskReason({ risk }: MarketSummary): string {
  if (risk === 'high') return 'High volatility environment - reducing risk exposure';
  if (risk === 'low') return 'Stable conditions - strategic portfolio optimization';
  return 'Moderate risk - tactical position adjustment';
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function explainAction(
  category: Category,
  market: MarketSummary,
  quote: Quote,
  action: TradeAction,
  categorySectors: Partial<Record<Category, string>> = CATEGORY_SECTORS,
): string[] {
  const sector = sectorFor(category, market, categorySectors);

  if (action === 'SELL') {
    return [sellSectorReason(sector), sellMomentumReason(quote), valuationReason(quote), sellRiskReason(market)];
  }

  return [
    buySectorReason(sector),
    buyMomentumReason(quote),
    dividendReason(quote),
    marketStanceReason(market),
    buyRiskReason(market),
  ];
}

export const explainActionTool = createTool({
  id: 'explain-action',
  description: 'Produce the standard ordered justification lines for buying or selling an ETF',
  inputSchema: z.object({
    symbol: z.string(),
    category: categorySchema,
    market: marketSummarySchema,
    quote: quoteSchema,
    action: tradeActionSchema,
  }),
  outputSchema: z.object({
    symbol: z.string(),
    reasons: z.array(z.string()),
  }),
  execute: async ({ context }) => {
    return {
      symbol: context.symbol.toUpperCase(),
      reasons: explainAction(context.category, context.market, context.quote, context.action),
    };
  },
});
