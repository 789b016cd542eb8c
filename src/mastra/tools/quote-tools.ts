// ============================================================================
// QUOTE TOOLS
// ============================================================================
// Market-data boundary. Fetches price, day change, dividend yield and P/E per
// symbol, all symbols in parallel. A failed symbol never aborts the cycle: it
// gets the fallback quote and a warning is reported to the caller.
// ============================================================================

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import YahooFinance from 'yahoo-finance2';

import { TtlCache } from '../lib/cache';
import { quoteMapSchema, type Quote, type QuoteMap } from '../lib/types';
import { logger } from '../logger';

const yf = new YahooFinance();

// ============================================================================
// TYPES
// ============================================================================

export interface RawQuote {
  regularMarketPrice?: number;
  regularMarketChangePercent?: number;
  trailingAnnualDividendYield?: number;
  trailingPE?: number;
}

export interface QuoteSource {
  quote(symbol: string): Promise<RawQuote | undefined>;
}

export interface QuoteFetchResult {
  quotes: QuoteMap;
  warnings: string[];
}

export const FALLBACK_QUOTE: Quote = {
  price: 100,
  changePct: 0,
  dividendYieldPct: 0,
  peRatio: null,
};

// ============================================================================
// SOURCES
// ============================================================================

export const yahooQuoteSource: QuoteSource = {
  quote: async (symbol) => {
    const quote = await yf.quote(symbol);
    if (!quote) return undefined;

    return {
      regularMarketPrice: quote.regularMarketPrice,
      regularMarketChangePercent: quote.regularMarketChangePercent,
      trailingAnnualDividendYield: quote.trailingAnnualDividendYield,
      trailingPE: quote.trailingPE,
    };
  },
};

/**
 * Normalize a raw quote. Yield arrives as a fraction and is stored as a
 * percentage; a non-positive or missing P/E is unknown.
 */
export function normalizeQuote(symbol: string, raw: RawQuote | undefined): Quote {
  if (!raw || raw.regularMarketPrice === undefined || raw.regularMarketPrice <= 0) {
    throw new Error(`No market price for ${symbol}`);
  }

  const peRatio = raw.trailingPE !== undefined && raw.trailingPE > 0 ? raw.trailingPE : null;

  return {
    price: raw.regularMarketPrice,
    changePct: raw.regularMarketChangePercent ?? 0,
    dividendYieldPct: (raw.trailingAnnualDividendYield ?? 0) * 100,
    peRatio,
  };
}

// ============================================================================
// FETCHING
// ============================================================================

export async function fetchQuotes(
  symbols: Iterable<string>,
  source: QuoteSource = yahooQuoteSource,
): Promise<QuoteFetchResult> {
  const unique = Array.from(new Set(symbols));
  const results = await Promise.allSettled(
    unique.map(async (symbol) => normalizeQuote(symbol, await source.quote(symbol))),
  );

  const quotes: QuoteMap = {};
  const warnings: string[] = [];

  results.forEach((result, i) => {
    const symbol = unique[i];
    if (result.status === 'fulfilled') {
      quotes[symbol] = result.value;
      return;
    }

    const reason: unknown = result.reason;
    const message = `Error fetching data for ${symbol}: ${reason instanceof Error ? reason.message : String(reason)}`;
    logger.warn(message);
    warnings.push(message);
    quotes[symbol] = { ...FALLBACK_QUOTE };
  });

  return { quotes, warnings };
}

/**
 * Cached quote fetches keyed by the requested symbol set.
 */
export class QuoteStore {
  private readonly cache: TtlCache<QuoteFetchResult>;

  constructor(
    private readonly source: QuoteSource = yahooQuoteSource,
    ttlMs = 300_000,
    now: () => number = Date.now,
  ) {
    this.cache = new TtlCache(ttlMs, now);
  }

  fetch(symbols: Iterable<string>): Promise<QuoteFetchResult> {
    const list = Array.from(symbols);
    return this.cache.getOrCompute(TtlCache.key('fetchQuotes', list), () => fetchQuotes(list, this.source));
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}

// ============================================================================
// TOOL
// ============================================================================

export const getQuotesTool = createTool({
  id: 'get-quotes',
  description: 'Get price, daily change %, dividend yield % and P/E ratio for a list of ETF symbols',
  inputSchema: z.object({
    symbols: z.array(z.string()).min(1).describe('ETF symbols (e.g., VTI, BND, VNQ)'),
  }),
  outputSchema: z.object({
    quotes: quoteMapSchema,
    warnings: z.array(z.string()),
  }),
  execute: async ({ context }) => {
    return fetchQuotes(context.symbols.map((symbol) => symbol.toUpperCase()));
  },
});
