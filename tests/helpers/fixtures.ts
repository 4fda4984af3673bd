import type { OptionalSignal, PriceBar, StockDataBundle } from "../../src/market/types";
import { emptyOptionalData } from "../../src/market/types";
import { buildAnalysisContent, createStockInfo, type StockInfo } from "../../src/workflow/states";
import { StockAnalysis } from "../../src/workflow/stock_analysis";

export const TEST_STOCK: StockInfo = createStockInfo({
  symbol: "TEST",
  name: "Test Holdings",
  sector: "Utilities",
  industry: "Water",
  currentPrice: 12.5,
});

export function priceBars(count: number): PriceBar[] {
  return Array.from({ length: count }, (_, index) => ({
    date: `2026-01-${String(index + 1).padStart(2, "0")}`,
    open: 10 + index,
    high: 11 + index,
    low: 9 + index,
    close: 10.5 + index,
    volume: 1000 * (index + 1),
  }));
}

export function signal(data: unknown, source = "test-source"): OptionalSignal {
  return { source, data };
}

export function makeBundle(overrides: Partial<StockDataBundle> = {}): StockDataBundle {
  return {
    stockInfo: TEST_STOCK,
    period: "1y",
    priceSeries: priceBars(3),
    indicators: { price: 12.5, ma20: 12, bb_upper: 13.25, bb_lower: 11, rsi: 55, volume_ratio: 1.2 },
    financialData: { financial_ratios: { pe_ratio: 15, roe: 12.34 } },
    ...emptyOptionalData(),
    ...overrides,
  };
}

export function content(text: string) {
  return buildAnalysisContent(text, ["focus"], 200);
}

export function fixedClock(iso: string): () => Date {
  const date = new Date(iso);
  return () => date;
}

export function newAnalysis(): StockAnalysis {
  return new StockAnalysis({ stockInfo: TEST_STOCK, period: "1y" });
}
