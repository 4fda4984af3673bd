import type { StockInfo } from "../workflow/states";

export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type IndicatorValues = Readonly<Record<string, number | string | null>>;

/**
 * Output of an optional signal source. `data` is opaque to the pipeline.
 */
export interface OptionalSignal {
  source: string;
  data: unknown;
}

export interface MarketDataBundle {
  stockInfo: StockInfo;
  period: string;
  priceSeries: readonly PriceBar[];
  indicators: IndicatorValues | null;
}

export type FinancialData = Readonly<Record<string, unknown>>;

/**
 * Everything analyst variants read. Owned by the calling use case.
 */
export interface StockDataBundle extends MarketDataBundle {
  financialData: FinancialData | null;
  quarterlyData: OptionalSignal | null;
  fundFlowData: OptionalSignal | null;
  sentimentData: OptionalSignal | null;
  newsData: OptionalSignal | null;
  riskData: OptionalSignal | null;
}

export interface MarketDataProvider {
  getDataBundle(symbol: string, period: string): Promise<MarketDataBundle>;
  getFinancialData(symbol: string): Promise<FinancialData | null>;
}

export interface OptionalDataProvider {
  getQuarterlyData(symbol: string): Promise<OptionalSignal | null>;
  getFundFlowData(symbol: string): Promise<OptionalSignal | null>;
  getSentimentData(symbol: string, priceSeries: readonly PriceBar[]): Promise<OptionalSignal | null>;
  getNewsData(symbol: string): Promise<OptionalSignal | null>;
  getRiskData(symbol: string): Promise<OptionalSignal | null>;
}

export function emptyOptionalData(): Pick<
  StockDataBundle,
  "quarterlyData" | "fundFlowData" | "sentimentData" | "newsData" | "riskData"
> {
  return {
    quarterlyData: null,
    fundFlowData: null,
    sentimentData: null,
    newsData: null,
    riskData: null,
  };
}
