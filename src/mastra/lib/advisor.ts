// ============================================================================
// ADVISOR ADAPTER
// ============================================================================
// Boundary to the external LLM advisor. Builds the prompt, makes exactly one
// call, and parses the free-text reply:
// 1. Whole reply is a JSON object → parse it
// 2. Otherwise take the first balanced {...} block
// 3. No JSON at all → text-only advice
// 4. Call or parse failure, or a schema mismatch → failed advice
//
// Advice with no recommendations tells the caller to use the deterministic
// engine instead.
// ============================================================================

import { z } from 'zod';

import { DIVERSIFIED_ETFS, getAssetCategory } from '../config';
import { logger } from '../logger';
import { explainAction } from '../tools/reasoning-tools';
import { scoreSymbol } from '../tools/scoring-tools';
import {
  allocationEntries,
  prioritySchema,
  tradeActionSchema,
  type Category,
  type HoldingMap,
  type MarketSummary,
  type QuoteMap,
  type Recommendation,
  type TargetAllocation,
} from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface AdvisorOracle {
  advise(prompt: string): Promise<string>;
}

export const adviceItemSchema = z.object({
  action: tradeActionSchema,
  symbol: z.string().min(1).transform((symbol) => symbol.toUpperCase()),
  shares: z.number().int().positive(),
  reasoning: z.string(),
  priority: prioritySchema.default('Medium'),
});

export const adviceResponseSchema = z.object({
  analysis: z.string(),
  recommendations: z.array(adviceItemSchema),
  risk_assessment: z.string(),
  market_timing: z.string(),
});

export type AdviceItem = z.infer<typeof adviceItemSchema>;

export type AdviceStatus = 'ok' | 'text' | 'failed';

export interface Advice {
  status: AdviceStatus;
  analysis: string;
  recommendations: AdviceItem[];
  riskAssessment: string;
  marketTiming: string;
}

export interface AdviceRequest {
  market: MarketSummary;
  quotes: QuoteMap;
  holdings: HoldingMap;
  targetAllocation: TargetAllocation;
  totalValue: number; // Market value of holdings, cash excluded
  cash: number;
  eligibleSymbols?: Partial<Record<Category, string[]>>;
}

export function failedAdvice(reason: string): Advice {
  return {
    status: 'failed',
    analysis: `Advisor unavailable: ${reason}. Using algorithmic recommendations.`,
    recommendations: [],
    riskAssessment: 'Unable to assess',
    marketTiming: 'Unable to assess',
  };
}

// ============================================================================
// CONTEXT & PROMPT
// ============================================================================

export interface SymbolSnapshot {
  shares: number;
  value: number;
  price: number;
  changePct: number;
  dividendYieldPct: number;
  peRatio: number | null;
  category: Category;
  currentPct: number;
  targetPct: number;
  overweight: boolean;
  underweight: boolean;
  isCurrentHolding: boolean;
}

export function buildPortfolioSnapshot(request: AdviceRequest, bandPct = 3): Record<string, SymbolSnapshot> {
  const { quotes, holdings, targetAllocation, totalValue, cash } = request;
  const accountValue = totalValue + cash;
  const snapshot: Record<string, SymbolSnapshot> = {};

  for (const [symbol, quote] of Object.entries(quotes)) {
    const holding = holdings[symbol];
    const shares = holding?.shares ?? 0;
    const value = shares * quote.price;
    const category = getAssetCategory(symbol);
    const currentPct = accountValue > 0 ? (value / accountValue) * 100 : 0;
    const targetPct = targetAllocation[category] ?? 0;

    snapshot[symbol] = {
      shares,
      value,
      price: quote.price,
      changePct: quote.changePct,
      dividendYieldPct: quote.dividendYieldPct,
      peRatio: quote.peRatio,
      category,
      currentPct,
      targetPct,
      overweight: currentPct > targetPct + bandPct,
      underweight: currentPct < targetPct - bandPct,
      isCurrentHolding: holding !== undefined,
    };
  }

  return snapshot;
}

export function buildAdvisorPrompt(request: AdviceRequest): string {
  const { market, targetAllocation, cash } = request;
  const eligible = request.eligibleSymbols ?? DIVERSIFIED_ETFS;

  const eligibleList = Object.entries(eligible)
    .map(([category, symbols]) => `- ${category}: ${(symbols ?? []).join(', ')}`)
    .join('\n');

  const targets = Object.fromEntries(allocationEntries(targetAllocation));

  return `Analyze the current portfolio and market conditions and provide specific buy/sell recommendations.

=== CURRENT PORTFOLIO ===
${JSON.stringify(buildPortfolioSnapshot(request), null, 2)}

=== TARGET ALLOCATION ===
${JSON.stringify(targets, null, 2)}

=== MARKET ANALYSIS ===
${JSON.stringify(
  {
    sentiment: market.sentiment,
    risk_level: market.risk,
    recommendation: market.recommendation,
    sector_performance: market.sectorAnalysis,
    key_insights: market.insights,
  },
  null,
  2,
)}

=== AVAILABLE CASH ===
$${cash.toFixed(0)}

=== ELIGIBLE SYMBOLS ===
${eligibleList}

=== OUTPUT FORMAT ===
Respond with ONLY this JSON object, no other text:
{
  "analysis": "Overall market assessment and strategy rationale",
  "recommendations": [
    { "action": "BUY", "symbol": "VTI", "shares": 5, "reasoning": "Specific reason for this trade", "priority": "High" }
  ],
  "risk_assessment": "Risk evaluation",
  "market_timing": "Timing insights"
}

Requirements:
1. Only use symbols from the eligible list
2. Move the portfolio toward the target allocation
3. Do not buy and sell the same symbol
4. Total purchases must not exceed available cash plus sale proceeds
5. shares must be a positive whole number`;
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * First balanced {...} block in the text, ignoring braces inside strings.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

function validateAdvice(candidate: unknown): Advice {
  const parsed = adviceResponseSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return failedAdvice(`malformed response (${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid shape'})`);
  }

  return {
    status: 'ok',
    analysis: parsed.data.analysis,
    recommendations: parsed.data.recommendations,
    riskAssessment: parsed.data.risk_assessment,
    marketTiming: parsed.data.market_timing,
  };
}

export function parseAdvice(raw: string): Advice {
  const text = raw.trim();
  if (!text) return failedAdvice('empty response');

  let json: string | null = null;
  if (text.startsWith('{') && text.endsWith('}')) {
    try {
      return validateAdvice(JSON.parse(text));
    } catch {
      // Not one object; fall through to the embedded-block search
      json = extractJsonObject(text);
    }
  } else {
    json = extractJsonObject(text);
  }

  if (json === null) {
    return {
      status: 'text',
      analysis: text,
      recommendations: [],
      riskAssessment: 'Advisor provided text analysis',
      marketTiming: 'Advisor provided text analysis',
    };
  }

  try {
    return validateAdvice(JSON.parse(json));
  } catch (error) {
    return failedAdvice(`unparseable JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function getAdvice(request: AdviceRequest, oracle: AdvisorOracle): Promise<Advice> {
  let raw: string;
  try {
    raw = await oracle.advise(buildAdvisorPrompt(request));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Advisor call failed: ${reason}`);
    return failedAdvice(reason);
  }

  const advice = parseAdvice(raw);
  if (advice.status === 'failed') {
    logger.warn(advice.analysis);
  }
  return advice;
}

export interface ConversionOptions {
  holdings?: HoldingMap;
  eligibleSymbols?: Partial<Record<Category, string[]>>;
}

/**
 * Price advisor items against current quotes. BUYs must name an eligible
 * symbol; SELLs must name an eligible or held one. Items that fail either
 * check, or whose symbol has no usable quote, are dropped.
 */
export function toRecommendations(
  advice: Advice,
  quotes: QuoteMap,
  market: MarketSummary,
  options: ConversionOptions = {},
): Recommendation[] {
  const holdings = options.holdings ?? {};
  const eligible = new Set(
    Object.values(options.eligibleSymbols ?? DIVERSIFIED_ETFS).flatMap((symbols) => symbols ?? []),
  );
  const recommendations: Recommendation[] = [];

  for (const item of advice.recommendations) {
    const allowed = eligible.has(item.symbol) || (item.action === 'SELL' && holdings[item.symbol] !== undefined);
    if (!allowed) {
      logger.warn(`Dropping advisor ${item.action} ${item.symbol}: not an eligible symbol`);
      continue;
    }

    const quote = quotes[item.symbol];
    if (!quote || quote.price <= 0) {
      logger.warn(`Dropping advisor ${item.action} ${item.symbol}: no quote`);
      continue;
    }

    const category = getAssetCategory(item.symbol);
    recommendations.push({
      symbol: item.symbol,
      shares: item.shares,
      price: quote.price,
      cost: item.shares * quote.price,
      category,
      action: item.action,
      reasoning: item.reasoning,
      detailedReasons: explainAction(category, market, quote, item.action),
      priority: item.priority,
      source: 'advisor',
      score: scoreSymbol(quote),
    });
  }

  return recommendations;
}
