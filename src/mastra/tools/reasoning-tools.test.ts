import { describe, expect, it } from 'vitest';

import type { MarketSummary, Quote } from '../lib/types';
import { explainAction } from './reasoning-tools';

const market: MarketSummary = {
  sentiment: 'neutral',
  risk: 'medium',
  recommendation: 'balanced',
  sectorAnalysis: {
    'US Large Cap': { performance: 1.5, dividendYield: 1.2, sentiment: 'strong' },
    International: { performance: -1.5, dividendYield: 2.1, sentiment: 'weak' },
  },
  insights: [],
};

const vti: Quote = { price: 250, changePct: 2.5, dividendYieldPct: 1.4, peRatio: 22 };

describe('explainAction', () => {
  it('gives five buy reasons in fixed order', () => {
    expect(explainAction('Stocks (US)', market, vti, 'BUY')).toEqual([
      'Strong sector momentum (+1.5%) - favorable entry point',
      'Strong price momentum (+2.5%) - bullish trend',
      'Modest dividend yield (1.4%) - some income',
      'Balanced market approach - diversified allocation',
      'Moderate risk environment - standard allocation',
    ]);
  });

  it('gives four sell reasons in fixed order', () => {
    expect(explainAction('Stocks (US)', market, vti, 'SELL')).toEqual([
      'Mixed sector signals (1.5%) - strategic rebalancing',
      'Moderate price action (+2.5%) - portfolio rebalancing',
      'Fair valuation (PE 22.0) - rebalancing decision',
      'Moderate risk - tactical position adjustment',
    ]);
  });

  it('treats a category without sector data as stable', () => {
    const aggressive: MarketSummary = { ...market, recommendation: 'aggressive_buy', risk: 'low' };
    const bnd: Quote = { price: 80, changePct: -2.5, dividendYieldPct: 3.5, peRatio: null };

    expect(explainAction('Bonds', aggressive, bnd, 'BUY')).toEqual([
      'Stable sector performance (0.0%) - balanced risk/reward',
      'Price weakness (-2.5%) - potential oversold opportunity',
      'Attractive dividend yield (3.5%) - income generation',
      'Market conditions favor growth - aggressive positioning',
      'Low volatility environment - stable investment climate',
    ]);
  });

  it('explains a sell in a weak, volatile market with unknown valuation', () => {
    const volatile: MarketSummary = { ...market, risk: 'high', recommendation: 'defensive' };
    const vtiax: Quote = { price: 30, changePct: -4, dividendYieldPct: 2.8, peRatio: null };

    expect(explainAction('Stocks (Intl)', volatile, vtiax, 'SELL')).toEqual([
      'Poor sector performance (-1.5%) - reducing exposure',
      'Significant price decline (-4.0%) - cutting losses',
      'Valuation unavailable - rebalancing decision',
      'High volatility environment - reducing risk exposure',
    ]);
  });

  it('uses the valuation ladder ends for sells', () => {
    const rich: Quote = { ...vti, peRatio: 31, changePct: 6 };
    const cheap: Quote = { ...vti, peRatio: 8 };

    expect(explainAction('Real Estate', market, rich, 'SELL').slice(1, 3)).toEqual([
      'Strong gains (6.0%) - taking profits',
      'Overvalued (PE 31.0) - profit taking',
    ]);
    expect(explainAction('Real Estate', market, cheap, 'SELL')[2]).toBe(
      'Undervalued but poor fundamentals (PE 8.0) - strategic exit',
    );
  });

  it('resolves the sector through a supplied category map', () => {
    const reasons = explainAction('Stocks (US)', market, vti, 'SELL', { 'Stocks (US)': 'International' });
    expect(reasons[0]).toBe('Poor sector performance (-1.5%) - reducing exposure');
  });

  it('is deterministic', () => {
    expect(explainAction('Stocks (US)', market, vti, 'BUY')).toEqual(explainAction('Stocks (US)', market, vti, 'BUY'));
  });
});
