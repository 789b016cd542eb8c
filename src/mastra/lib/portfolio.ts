// ============================================================================
// PORTFOLIO STATE
// ============================================================================
// Owned portfolio state (holdings, cash, execution log) and the read-only
// valuation helpers the engine and adapter share.
// ============================================================================

import { getAssetCategory, toHoldingMap } from '../config';
import type { Category, Holding, HoldingMap, PortfolioState, QuoteMap } from './types';

export interface PortfolioValuation {
  holdingsValue: number;
  breakdown: Partial<Record<Category, number>>;
}

export interface AccountSummary {
  holdingsValue: number;
  cash: number;
  totalValue: number;
  uninvestedPct: number;
}

export function createPortfolioState(cashBalance: number, holdings: Holding[] = []): PortfolioState {
  if (cashBalance < 0) {
    throw new Error(`Cash balance cannot be negative: ${cashBalance}`);
  }
  return {
    holdings: toHoldingMap(holdings),
    cashBalance,
    executionLog: [],
  };
}

/**
 * Market value of held positions, total and per category. Symbols without a
 * quote contribute nothing.
 */
export function valuePortfolio(holdings: HoldingMap, quotes: QuoteMap): PortfolioValuation {
  let holdingsValue = 0;
  const breakdown: Partial<Record<Category, number>> = {};

  for (const holding of Object.values(holdings)) {
    const quote = quotes[holding.symbol];
    if (!quote) continue;

    const value = holding.shares * quote.price;
    holdingsValue += value;

    const category = getAssetCategory(holding.symbol);
    breakdown[category] = (breakdown[category] ?? 0) + value;
  }

  return { holdingsValue, breakdown };
}

export function accountSummary(state: PortfolioState, quotes: QuoteMap): AccountSummary {
  const { holdingsValue } = valuePortfolio(state.holdings, quotes);
  const totalValue = holdingsValue + state.cashBalance;

  return {
    holdingsValue,
    cash: state.cashBalance,
    totalValue,
    uninvestedPct: totalValue > 0 ? (state.cashBalance / totalValue) * 100 : 0,
  };
}

export function deposit(state: PortfolioState, amount: number, now: () => Date = () => new Date()): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new Error(`Deposit amount must be positive: ${amount}`);
  }

  state.cashBalance += amount;
  state.executionLog.push({
    timestamp: now().toISOString(),
    action: 'DEPOSIT',
    symbol: null,
    shares: 0,
    description: `Deposited $${amount.toFixed(2)}`,
    amount,
  });
}

export function shouldInvest(state: PortfolioState, threshold: number): boolean {
  return state.cashBalance > threshold;
}
