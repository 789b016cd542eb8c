// ============================================================================
// REBALANCE SESSION
// ============================================================================
// One analysis cycle at a time against an owned portfolio state:
//   quotes → market summary → advisor (optional) → fallback engine → execute
//
// Quotes, the market summary and advice are cached for the TTL window and
// all three caches are invalidated after every execution batch. The cycle
// helpers below are shared with the rebalance workflow.
// ============================================================================

import {
  DIVERSIFIED_ETFS,
  RESEARCH_SYMBOLS,
  SECTORS,
  TARGET_ALLOCATION,
  resolveConfig,
  type EngineConfig,
} from '../config';
import { logger } from '../logger';
import { analyzeMarket } from '../tools/market-tools';
import { QuoteStore, yahooQuoteSource, type QuoteSource } from '../tools/quote-tools';
import { diversify, rebalance } from '../tools/rebalance-tools';
import { getAdvice, toRecommendations, type Advice, type AdvisorOracle } from './advisor';
import { TtlCache, type Invalidatable } from './cache';
import { applyRecommendations, type ExecutionResult } from './executor';
import { accountSummary, deposit, shouldInvest, valuePortfolio, type AccountSummary } from './portfolio';
import type {
  Category,
  HoldingMap,
  MarketSummary,
  PortfolioState,
  QuoteMap,
  Recommendation,
  RecommendationSource,
  TargetAllocation,
} from './types';

// ============================================================================
// CYCLE CACHES
// ============================================================================

export interface CycleCaches {
  quotes: QuoteStore;
  market: TtlCache<MarketSummary>;
  advice: TtlCache<Advice>;
}

export function createCycleCaches(
  ttlMs: number,
  quoteSource: QuoteSource = yahooQuoteSource,
  now: () => number = Date.now,
): CycleCaches {
  return {
    quotes: new QuoteStore(quoteSource, ttlMs, now),
    market: new TtlCache(ttlMs, now),
    advice: new TtlCache(ttlMs, now),
  };
}

export function allCaches(caches: CycleCaches): Invalidatable[] {
  return [caches.quotes, caches.market, caches.advice];
}

// ============================================================================
// CYCLE STEPS
// ============================================================================

export interface MarketSnapshot {
  quotes: QuoteMap;
  market: MarketSummary;
  warnings: string[];
}

export async function marketSnapshot(symbols: string[], caches: CycleCaches): Promise<MarketSnapshot> {
  const { quotes, warnings } = await caches.quotes.fetch(symbols);
  const market = await caches.market.getOrCompute(TtlCache.key('analyzeMarket', symbols), async () =>
    analyzeMarket(quotes, SECTORS),
  );
  return { quotes, market, warnings };
}

export interface PlanInput {
  quotes: QuoteMap;
  market: MarketSummary;
  holdings: HoldingMap;
  cash: number;
  targetAllocation: TargetAllocation;
  config: EngineConfig;
  oracle: AdvisorOracle | null;
  adviceCache?: TtlCache<Advice>;
  eligibleSymbols?: Partial<Record<Category, string[]>>;
}

export interface Plan {
  advice: Advice | null;
  recommendations: Recommendation[];
  source: RecommendationSource;
}

// Advice depends on the account as well as the symbol set
function adviceKey(quotes: QuoteMap, holdings: HoldingMap, cash: number): string {
  const positions = Object.values(holdings)
    .map((h) => `${h.symbol}=${h.shares}`)
    .sort()
    .join(',');
  return `${TtlCache.key('getAdvice', Object.keys(quotes))}|cash=${cash}|${positions}`;
}

/**
 * Ask the advisor (when one is given) and fall back to the configured
 * deterministic strategy when its plan converts to nothing.
 */
export async function planRecommendations(input: PlanInput): Promise<Plan> {
  const { quotes, market, holdings, cash, targetAllocation, config, oracle } = input;
  const eligibleSymbols = input.eligibleSymbols ?? DIVERSIFIED_ETFS;

  let advice: Advice | null = null;
  let recommendations: Recommendation[] = [];
  let source: RecommendationSource = 'algorithmic';

  if (oracle) {
    const ask = () =>
      getAdvice(
        {
          market,
          quotes,
          holdings,
          targetAllocation,
          totalValue: valuePortfolio(holdings, quotes).holdingsValue,
          cash,
          eligibleSymbols,
        },
        oracle,
      );
    advice = input.adviceCache
      ? await input.adviceCache.getOrCompute(adviceKey(quotes, holdings, cash), ask)
      : await ask();
    recommendations = toRecommendations(advice, quotes, market, { holdings, eligibleSymbols });
    if (recommendations.length > 0) source = 'advisor';
  }

  if (recommendations.length === 0 && cash > 0) {
    logger.info(`Using ${config.fallbackStrategy} engine for $${cash.toFixed(2)} available cash`);
    recommendations =
      config.fallbackStrategy === 'diversified'
        ? diversify(cash, targetAllocation, quotes, market)
        : rebalance({
            holdings,
            targetAllocation,
            market,
            quotes,
            cashAvailable: cash,
            policy: {
              overweightBandPct: config.overweightBandPct,
              sellFraction: config.sellFraction,
              highRiskSellFraction: config.highRiskSellFraction,
            },
          });
  }

  return { advice, recommendations, source };
}

// ============================================================================
// SESSION
// ============================================================================

export interface SessionOptions {
  state: PortfolioState;
  targetAllocation?: TargetAllocation;
  quoteSource?: QuoteSource;
  oracle?: AdvisorOracle | null;
  config?: Partial<EngineConfig>;
  researchSymbols?: string[];
  now?: () => number;
}

export interface RecommendationPlan extends MarketSnapshot, Plan {
  account: AccountSummary;
}

export class RebalanceSession {
  readonly state: PortfolioState;
  readonly config: EngineConfig;
  private readonly targetAllocation: TargetAllocation;
  private readonly oracle: AdvisorOracle | null;
  private readonly researchSymbols: string[];
  private readonly now: () => number;
  private readonly caches: CycleCaches;

  constructor(options: SessionOptions) {
    this.state = options.state;
    this.config = resolveConfig(options.config);
    this.targetAllocation = options.targetAllocation ?? TARGET_ALLOCATION;
    this.oracle = options.oracle ?? null;
    this.researchSymbols = options.researchSymbols ?? RESEARCH_SYMBOLS;
    this.now = options.now ?? Date.now;
    this.caches = createCycleCaches(this.config.cacheTtlSeconds * 1000, options.quoteSource, this.now);
  }

  private symbols(): string[] {
    return Array.from(new Set([...this.researchSymbols, ...Object.keys(this.state.holdings)]));
  }

  snapshot(): Promise<MarketSnapshot> {
    return marketSnapshot(this.symbols(), this.caches);
  }

  shouldInvest(): boolean {
    return shouldInvest(this.state, this.config.investmentThreshold);
  }

  deposit(amount: number = this.config.depositAmount): void {
    deposit(this.state, amount, () => new Date(this.now()));
    this.caches.advice.invalidate();
  }

  async recommend(): Promise<RecommendationPlan> {
    const { quotes, market, warnings } = await this.snapshot();

    const plan = await planRecommendations({
      quotes,
      market,
      holdings: this.state.holdings,
      cash: this.state.cashBalance,
      targetAllocation: this.targetAllocation,
      config: this.config,
      oracle: this.oracle,
      adviceCache: this.caches.advice,
    });

    return {
      quotes,
      market,
      warnings,
      ...plan,
      account: accountSummary(this.state, quotes),
    };
  }

  execute(recommendations: Recommendation[]): ExecutionResult {
    return applyRecommendations(recommendations, this.state, {
      invalidate: allCaches(this.caches),
      now: () => new Date(this.now()),
    });
  }
}
