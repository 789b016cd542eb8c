// ============================================================================
// EXECUTION APPLIER
// ============================================================================
// Applies a finalized recommendation list to portfolio state, strictly in
// order. Each item is all-or-nothing: either holdings, cash and the log all
// change, or nothing does and a typed rejection is returned.
// ============================================================================

import { logger } from '../logger';
import type { Invalidatable } from './cache';
import { InsufficientFundsError, InsufficientSharesError, type ExecutionRejectionError } from './errors';
import type { PortfolioState, Recommendation } from './types';

export interface ExecutionResult {
  totalInvested: number;
  totalSold: number;
  executed: Recommendation[];
  rejections: ExecutionRejectionError[];
}

export interface ExecutionOptions {
  // Caches that go stale once holdings or cash change
  invalidate?: Invalidatable[];
  now?: () => Date;
}

function applyBuy(rec: Recommendation, state: PortfolioState, timestamp: string): InsufficientFundsError | null {
  if (rec.cost > state.cashBalance) {
    return new InsufficientFundsError(rec, state.cashBalance);
  }

  const existing = state.holdings[rec.symbol];
  state.holdings[rec.symbol] = {
    symbol: rec.symbol,
    shares: (existing?.shares ?? 0) + rec.shares,
  };
  state.cashBalance -= rec.cost;
  state.executionLog.push({
    timestamp,
    action: 'BUY',
    symbol: rec.symbol,
    shares: rec.shares,
    description: `Bought ${rec.shares} shares of ${rec.symbol}`,
    amount: rec.cost,
  });
  return null;
}

function applySell(rec: Recommendation, state: PortfolioState, timestamp: string): InsufficientSharesError | null {
  const held = state.holdings[rec.symbol]?.shares ?? 0;
  if (rec.shares > held) {
    return new InsufficientSharesError(rec, held);
  }

  const remaining = held - rec.shares;
  if (remaining === 0) {
    delete state.holdings[rec.symbol];
  } else {
    state.holdings[rec.symbol] = { symbol: rec.symbol, shares: remaining };
  }
  state.cashBalance += rec.cost;
  state.executionLog.push({
    timestamp,
    action: 'SELL',
    symbol: rec.symbol,
    shares: rec.shares,
    description: `Sold ${rec.shares} shares of ${rec.symbol}`,
    amount: rec.cost,
  });
  return null;
}

export function applyRecommendations(
  recommendations: Recommendation[],
  state: PortfolioState,
  options: ExecutionOptions = {},
): ExecutionResult {
  const now = options.now ?? (() => new Date());
  const result: ExecutionResult = {
    totalInvested: 0,
    totalSold: 0,
    executed: [],
    rejections: [],
  };

  for (const rec of recommendations) {
    const timestamp = now().toISOString();
    const rejection = rec.action === 'BUY' ? applyBuy(rec, state, timestamp) : applySell(rec, state, timestamp);

    if (rejection) {
      logger.warn(`Rejected ${rec.action} ${rec.symbol}: ${rejection.message}`);
      result.rejections.push(rejection);
      continue;
    }

    if (rec.action === 'BUY') {
      result.totalInvested += rec.cost;
    } else {
      result.totalSold += rec.cost;
    }
    result.executed.push(rec);
    logger.info(`${rec.action} ${rec.shares} ${rec.symbol} @ $${rec.price.toFixed(2)} ($${rec.cost.toFixed(2)})`);
  }

  for (const cache of options.invalidate ?? []) {
    cache.invalidate();
  }

  return result;
}
