// ============================================================================
// CONFIGURATION
// ============================================================================
// Policy inputs for the rebalancing engine (symbol universe, category and
// sector mappings, default targets, starting balances) plus the engine knobs
// and environment settings.
// ============================================================================

import 'dotenv/config';
import { z } from 'zod';

import type { Category, Holding, HoldingMap, TargetAllocation } from './lib/types';

// ============================================================================
// ENVIRONMENT
// ============================================================================

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  ADVISOR_MODEL: z.string().default('gpt-4o'),
  ADVISOR_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const env = envSchema.parse(process.env);

export function isAdvisorConfigured(): boolean {
  return env.ADVISOR_ENABLED && Boolean(env.OPENAI_API_KEY);
}

// ============================================================================
// SYMBOL UNIVERSE
// ============================================================================

export const RESEARCH_SYMBOLS = [
  'VTI', 'VTIAX', 'BND', 'VNQ', 'SPY', 'QQQ', 'IWM', 'EFA', 'TLT', 'IYR',
  'VEA', 'VWO', 'AGG', 'BNDX', 'VXUS', 'VUG', 'VTV', 'VYM', 'SCHD', 'DGRO',
];

export const ASSET_CATEGORIES: Record<string, Category> = {
  VTI: 'Stocks (US)',
  SPY: 'Stocks (US)',
  QQQ: 'Stocks (US)',
  IWM: 'Stocks (US)',
  VUG: 'Stocks (US)',
  VTV: 'Stocks (US)',
  VYM: 'Stocks (US)',
  SCHD: 'Stocks (US)',
  DGRO: 'Stocks (US)',
  VTIAX: 'Stocks (Intl)',
  EFA: 'Stocks (Intl)',
  VEA: 'Stocks (Intl)',
  VWO: 'Stocks (Intl)',
  VXUS: 'Stocks (Intl)',
  BND: 'Bonds',
  TLT: 'Bonds',
  AGG: 'Bonds',
  BNDX: 'Bonds',
  VNQ: 'Real Estate',
  IYR: 'Real Estate',
};

export function getAssetCategory(symbol: string): Category {
  return ASSET_CATEGORIES[symbol] ?? 'Other';
}

// Sectors are finer than categories and only feed market analysis
export const SECTORS: Record<string, string[]> = {
  'US Large Cap': ['SPY', 'VTI'],
  'US Small Cap': ['IWM'],
  International: ['EFA', 'VTIAX'],
  Bonds: ['BND', 'TLT'],
  'Real Estate': ['VNQ', 'IYR'],
  Tech: ['QQQ'],
};

export const CATEGORY_SECTORS: Partial<Record<Category, string>> = {
  'Stocks (US)': 'US Large Cap',
  'Stocks (Intl)': 'International',
  Bonds: 'Bonds',
  'Real Estate': 'Real Estate',
};

export const PRIMARY_ETFS: Partial<Record<Category, string>> = {
  'Stocks (US)': 'VTI',
  'Stocks (Intl)': 'VTIAX',
  Bonds: 'BND',
  'Real Estate': 'VNQ',
};

export const DIVERSIFIED_ETFS: Partial<Record<Category, string[]>> = {
  'Stocks (US)': ['VTI', 'SPY', 'QQQ', 'VUG', 'VTV', 'VYM', 'SCHD', 'DGRO'],
  'Stocks (Intl)': ['VTIAX', 'EFA', 'VEA', 'VWO', 'VXUS'],
  Bonds: ['BND', 'TLT', 'AGG', 'BNDX'],
  'Real Estate': ['VNQ', 'IYR'],
};

// ============================================================================
// STARTING POSITION
// ============================================================================

export const TARGET_ALLOCATION: TargetAllocation = {
  'Stocks (US)': 60,
  'Stocks (Intl)': 20,
  Bonds: 15,
  'Real Estate': 5,
};

export const INITIAL_CASH_BALANCE = 2500;

export const INITIAL_HOLDINGS: Holding[] = [
  { symbol: 'VTI', shares: 12 },
  { symbol: 'VTIAX', shares: 8 },
  { symbol: 'BND', shares: 15 },
  { symbol: 'VNQ', shares: 5 },
];

export function toHoldingMap(holdings: Holding[]): HoldingMap {
  const map: HoldingMap = {};
  for (const holding of holdings) {
    if (holding.shares > 0) {
      const existing = map[holding.symbol];
      map[holding.symbol] = {
        symbol: holding.symbol,
        shares: (existing?.shares ?? 0) + holding.shares,
      };
    }
  }
  return map;
}

// ============================================================================
// ENGINE KNOBS
// ============================================================================

export type FallbackStrategy = 'rebalance' | 'diversified';

export interface EngineConfig {
  overweightBandPct: number; // Sell when current > target + band
  sellFraction: number; // Share of a position trimmed on non-overweight triggers
  highRiskSellFraction: number; // Same, in a high-risk market
  cacheTtlSeconds: number;
  investmentThreshold: number; // Cash above this triggers a decision cycle
  depositAmount: number;
  fallbackStrategy: FallbackStrategy;
}

export const DEFAULT_CONFIG: EngineConfig = {
  overweightBandPct: 3,
  sellFraction: 0.15,
  highRiskSellFraction: 0.2,
  cacheTtlSeconds: 300,
  investmentThreshold: 500,
  depositAmount: 800,
  fallbackStrategy: 'rebalance',
};

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
  };
}
