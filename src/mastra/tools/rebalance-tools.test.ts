import { describe, expect, it } from 'vitest';

import { toHoldingMap } from '../config';
import type { MarketSummary, Quote, QuoteMap, Recommendation } from '../lib/types';
import { adjustTargetAllocation, bestPerformer, byCostDescending, diversify, rebalance } from './rebalance-tools';

const quote = (price: number, changePct = 0, dividendYieldPct = 0, peRatio: number | null = null): Quote => ({
  price,
  changePct,
  dividendYieldPct,
  peRatio,
});

const balanced: MarketSummary = {
  sentiment: 'neutral',
  risk: 'medium',
  recommendation: 'balanced',
  sectorAnalysis: {},
  insights: [],
};

const quotes: QuoteMap = {
  VTI: quote(250, 0.5, 1.3, 24),
  VTIAX: quote(30),
  BND: quote(80),
  VNQ: quote(90),
};

const summarize = (recs: Recommendation[]) => recs.map((r) => [r.action, r.symbol, r.shares, r.cost]);

describe('adjustTargetAllocation', () => {
  const target = { 'Stocks (US)': 60, 'Stocks (Intl)': 20, Bonds: 15, 'Real Estate': 5 };

  it('tilts toward US stocks in an aggressive market', () => {
    expect(adjustTargetAllocation(target, 'aggressive_buy')).toEqual({
      'Stocks (US)': 70,
      'Stocks (Intl)': 20,
      Bonds: 5,
      'Real Estate': 5,
    });
  });

  it('tilts toward bonds in a defensive market', () => {
    expect(adjustTargetAllocation(target, 'defensive')).toEqual({
      'Stocks (US)': 45,
      'Stocks (Intl)': 20,
      Bonds: 30,
      'Real Estate': 5,
    });
  });

  it('respects the overlay caps', () => {
    expect(adjustTargetAllocation({ 'Stocks (US)': 65, Bonds: 12 }, 'aggressive_buy')).toEqual({
      'Stocks (US)': 70,
      Bonds: 5,
    });
    expect(adjustTargetAllocation({ 'Stocks (US)': 50, Bonds: 25 }, 'defensive')).toEqual({
      'Stocks (US)': 40,
      Bonds: 30,
    });
  });

  it('leaves the target alone otherwise and keeps category order', () => {
    expect(Object.keys(adjustTargetAllocation(target, 'balanced'))).toEqual(Object.keys(target));
    expect(adjustTargetAllocation(target, 'proceed_with_caution')).toEqual(target);
    expect(adjustTargetAllocation({ 'Stocks (Intl)': 100 }, 'defensive')).toEqual({ 'Stocks (Intl)': 100 });
  });
});

describe('rebalance', () => {
  it('splits cash across categories with the last one taking the remainder', () => {
    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 12 }]),
      targetAllocation: { 'Stocks (US)': 60, Bonds: 40 },
      market: balanced,
      quotes,
      cashAvailable: 2500,
    });

    expect(summarize(recs)).toEqual([
      ['BUY', 'VTI', 6, 1500],
      ['BUY', 'BND', 12, 960],
    ]);
    expect(recs[0].reasoning).toBe('Market-adjusted allocation: 60% in Stocks (US) (Market: neutral)');
    expect(recs[0].priority).toBe('High');
    expect(recs[0].source).toBe('algorithmic');
    expect(recs[1].priority).toBe('High');
  });

  it('trims an overweight category and reinvests the proceeds', () => {
    const recs = rebalance({
      holdings: toHoldingMap([
        { symbol: 'VTI', shares: 40 },
        { symbol: 'BND', shares: 10 },
      ]),
      targetAllocation: { 'Stocks (US)': 60, Bonds: 40 },
      market: balanced,
      quotes,
      cashAvailable: 1200,
    });

    expect(summarize(recs)).toEqual([
      ['SELL', 'VTI', 11, 2750],
      ['BUY', 'VTI', 9, 2250],
      ['BUY', 'BND', 21, 1680],
    ]);
    expect(recs[0].reasoning).toBe('Sell 11 shares of VTI - Portfolio overweight by 23.3% - rebalancing needed');
    expect(recs[0].priority).toBe('High');
    expect(recs[0].detailedReasons).toHaveLength(4);
  });

  it('sells a fraction of a losing position', () => {
    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 30 }]),
      targetAllocation: { 'Stocks (US)': 95, Bonds: 5 },
      market: balanced,
      quotes: { ...quotes, VTI: quote(250, -4, 1.3, 24) },
      cashAvailable: 500,
    });

    expect(summarize(recs)).toEqual([
      ['BUY', 'VTI', 5, 1250],
      ['SELL', 'VTI', 4, 1000],
      ['BUY', 'BND', 3, 240],
    ]);
    expect(recs[1].reasoning).toBe('Sell 4 shares of VTI - Poor performance (-4.0%) - cutting losses');
    expect(recs[1].priority).toBe('Medium');
  });

  it('sells harder and shifts toward bonds in a high-risk market', () => {
    const volatile: MarketSummary = { ...balanced, risk: 'high', recommendation: 'defensive' };

    const recs = rebalance({
      holdings: toHoldingMap([
        { symbol: 'VTI', shares: 30 },
        { symbol: 'BND', shares: 50 },
      ]),
      targetAllocation: { 'Stocks (US)': 95, Bonds: 5 },
      market: volatile,
      quotes,
      cashAvailable: 0,
    });

    expect(summarize(recs)).toEqual([
      ['BUY', 'VTI', 10, 2500],
      ['SELL', 'BND', 21, 1680],
      ['SELL', 'VTI', 6, 1500],
      ['BUY', 'BND', 8, 640],
    ]);
    expect(recs[1].reasoning).toBe(
      'Sell 21 shares of BND - Portfolio overweight by 14.8% - rebalancing needed, High volatility environment - reducing risk exposure',
    );
    expect(recs[2].reasoning).toBe('Sell 6 shares of VTI - High volatility environment - reducing risk exposure');
  });

  it('reduces exposure to a weak sector', () => {
    const weak: MarketSummary = {
      ...balanced,
      sectorAnalysis: { 'US Large Cap': { performance: -1.8, dividendYield: 1.3, sentiment: 'weak' } },
    };

    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 30 }]),
      targetAllocation: { 'Stocks (US)': 100 },
      market: weak,
      quotes,
      cashAvailable: 0,
    });

    expect(summarize(recs)).toEqual([
      ['SELL', 'VTI', 4, 1000],
      ['BUY', 'VTI', 4, 1000],
    ]);
    expect(recs[0].reasoning).toBe('Sell 4 shares of VTI - Weak sector sentiment - reducing exposure');
  });

  it('takes profits on an overvalued position', () => {
    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 30 }]),
      targetAllocation: { 'Stocks (US)': 95, Bonds: 5 },
      market: balanced,
      quotes: { ...quotes, VTI: quote(250, 0.5, 1.3, 35) },
      cashAvailable: 500,
    });

    expect(summarize(recs)).toEqual([
      ['BUY', 'VTI', 5, 1250],
      ['SELL', 'VTI', 4, 1000],
      ['BUY', 'BND', 3, 240],
    ]);
    expect(recs[1].reasoning).toBe('Sell 4 shares of VTI - Overvalued (PE 35.0) - profit taking');
  });

  it('joins every reason that fires on one sell', () => {
    const stressed: MarketSummary = {
      sentiment: 'neutral',
      risk: 'high',
      recommendation: 'defensive',
      sectorAnalysis: { 'US Large Cap': { performance: -2, dividendYield: 1, sentiment: 'weak' } },
      insights: [],
    };

    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 40 }]),
      targetAllocation: { 'Stocks (US)': 95, Bonds: 5 },
      market: stressed,
      quotes: { ...quotes, VTI: quote(250, -4, 1.3, 35) },
      cashAvailable: 0,
    });

    expect(summarize(recs)).toEqual([
      ['SELL', 'VTI', 8, 2000],
      ['BUY', 'VTI', 6, 1500],
      ['BUY', 'BND', 6, 480],
    ]);
    expect(recs[0].reasoning).toBe(
      'Sell 8 shares of VTI - Portfolio overweight by 20.0% - rebalancing needed, ' +
        'Poor performance (-4.0%) - cutting losses, ' +
        'Overvalued (PE 35.0) - profit taking, ' +
        'Weak sector sentiment - reducing exposure, ' +
        'High volatility environment - reducing risk exposure',
    );
    expect(recs[0].priority).toBe('High');
    expect(recs[0].detailedReasons[0]).toBe('Poor sector performance (-2.0%) - reducing exposure');
  });

  it('deploys cash along the aggressive overlay', () => {
    const aggressive: MarketSummary = { ...balanced, sentiment: 'bullish', risk: 'low', recommendation: 'aggressive_buy' };

    const recs = rebalance({
      holdings: {},
      targetAllocation: { 'Stocks (US)': 60, 'Stocks (Intl)': 20, Bonds: 15, 'Real Estate': 5 },
      market: aggressive,
      quotes,
      cashAvailable: 10000,
    });

    expect(summarize(recs)).toEqual([
      ['BUY', 'VTI', 28, 7000],
      ['BUY', 'VTIAX', 66, 1980],
      ['BUY', 'VNQ', 6, 540],
      ['BUY', 'BND', 6, 480],
    ]);
    expect(recs[0].reasoning).toBe('Market-adjusted allocation: 70% in Stocks (US) (Market: neutral)');
    expect(recs[3].reasoning).toBe('Market-adjusted allocation: 5% in Bonds (Market: neutral)');
    expect(recs.every((r) => r.priority === 'High')).toBe(true);
  });

  it('uses the overridden sector map for triggers and explanations alike', () => {
    const techSlump: MarketSummary = {
      ...balanced,
      sectorAnalysis: { Tech: { performance: -2.5, dividendYield: 0, sentiment: 'weak' } },
    };

    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 30 }]),
      targetAllocation: { 'Stocks (US)': 100 },
      market: techSlump,
      quotes,
      cashAvailable: 0,
      policy: { categorySectors: { 'Stocks (US)': 'Tech' } },
    });

    expect(summarize(recs)).toEqual([
      ['SELL', 'VTI', 4, 1000],
      ['BUY', 'VTI', 4, 1000],
    ]);
    expect(recs[0].reasoning).toBe('Sell 4 shares of VTI - Weak sector sentiment - reducing exposure');
    expect(recs[0].detailedReasons[0]).toBe('Poor sector performance (-2.5%) - reducing exposure');
    expect(recs[1].reasoning).toBe('Market-adjusted allocation: 100% in Stocks (US) (Market: weak)');
    expect(recs[1].detailedReasons[0]).toBe('Weak sector performance (-2.5%) - potential value opportunity');
  });

  it('never buys a category whose primary ETF has no price', () => {
    const { BND: _dropped, ...withoutBonds } = quotes;

    const recs = rebalance({
      holdings: toHoldingMap([{ symbol: 'VTI', shares: 12 }]),
      targetAllocation: { 'Stocks (US)': 60, Bonds: 40 },
      market: balanced,
      quotes: withoutBonds,
      cashAvailable: 2500,
    });

    expect(summarize(recs)).toEqual([['BUY', 'VTI', 6, 1500]]);
  });

  it('returns nothing with no cash and nothing to trim', () => {
    expect(
      rebalance({
        holdings: toHoldingMap([{ symbol: 'VTI', shares: 12 }]),
        targetAllocation: { 'Stocks (US)': 100 },
        market: balanced,
        quotes,
        cashAvailable: 0,
      }),
    ).toEqual([]);
  });

  it('keeps every buy and sell positive and within the cash pool', () => {
    const holdings = toHoldingMap([
      { symbol: 'VTI', shares: 12 },
      { symbol: 'VTIAX', shares: 8 },
      { symbol: 'BND', shares: 15 },
      { symbol: 'VNQ', shares: 5 },
    ]);

    const recs = rebalance({
      holdings,
      targetAllocation: { 'Stocks (US)': 60, 'Stocks (Intl)': 20, Bonds: 15, 'Real Estate': 5 },
      market: balanced,
      quotes,
      cashAvailable: 2500,
    });

    const sold = recs.filter((r) => r.action === 'SELL').reduce((sum, r) => sum + r.cost, 0);
    const bought = recs.filter((r) => r.action === 'BUY').reduce((sum, r) => sum + r.cost, 0);

    expect(bought).toBeLessThanOrEqual(2500 + sold);
    for (const rec of recs) {
      expect(rec.shares).toBeGreaterThan(0);
      expect(rec.cost).toBe(rec.shares * rec.price);
      if (rec.action === 'SELL') {
        expect(rec.shares).toBeLessThanOrEqual(holdings[rec.symbol]?.shares ?? 0);
      }
    }
    for (let i = 1; i < recs.length; i++) {
      expect(recs[i - 1].cost).toBeGreaterThanOrEqual(recs[i].cost);
    }
  });
});

describe('byCostDescending', () => {
  const rec = (action: 'BUY' | 'SELL', symbol: string, cost: number): Recommendation => ({
    symbol,
    shares: 1,
    price: cost,
    cost,
    category: 'Stocks (US)',
    action,
    reasoning: '',
    detailedReasons: [],
    priority: 'Medium',
    source: 'algorithmic',
    score: 50,
  });

  it('orders by cost and keeps emission order on ties', () => {
    const sorted = byCostDescending([rec('SELL', 'A', 500), rec('BUY', 'B', 300), rec('BUY', 'C', 500)]);
    expect(sorted.map((r) => r.symbol)).toEqual(['A', 'C', 'B']);
  });

  it('does not mutate its input', () => {
    const input = [rec('BUY', 'A', 1), rec('BUY', 'B', 2)];
    byCostDescending(input);
    expect(input.map((r) => r.symbol)).toEqual(['A', 'B']);
  });
});

describe('diversify', () => {
  const wide: QuoteMap = {
    VTI: quote(250, 0.5),
    SPY: quote(500, 1.2),
    QQQ: quote(400, -0.3),
    BND: quote(80, 0.1),
    AGG: quote(100, 0.4),
  };

  it('buys the best performer per category from the remaining cash', () => {
    const recs = diversify(2000, { 'Stocks (US)': 60, Bonds: 40 }, wide, balanced);

    expect(summarize(recs)).toEqual([
      ['BUY', 'SPY', 2, 1000],
      ['BUY', 'AGG', 4, 400],
    ]);
    expect(recs[0].reasoning).toBe('Diversified allocation: 60% in Stocks (US) (Best performer: SPY)');
    expect(recs[1].category).toBe('Bonds');
  });

  it('skips categories with no priced candidate', () => {
    expect(diversify(2000, { 'Real Estate': 100 }, wide, balanced)).toEqual([]);
  });
});

describe('bestPerformer', () => {
  it('falls back to the first candidate without quotes', () => {
    expect(bestPerformer(['A', 'B'], {})).toBe('A');
    expect(bestPerformer([], {})).toBeNull();
  });
});
