import { readFile } from "node:fs/promises";

import { ConfigError, errorMessage, UpstreamDataUnavailableError } from "../errors";
import { marketDataFileSchema, type MarketDataFile, type StockFixture } from "../schemas/market_data";
import { createStockInfo } from "../workflow/states";
import type {
  FinancialData,
  MarketDataBundle,
  MarketDataProvider,
  OptionalDataProvider,
  OptionalSignal,
  PriceBar,
} from "./types";

function symbolKey(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Serves both data ports from a validated JSON document keyed by symbol.
 */
export class FileMarketDataProvider implements MarketDataProvider, OptionalDataProvider {
  private readonly source: string;
  private readonly stocks = new Map<string, StockFixture>();

  constructor(data: MarketDataFile) {
    this.source = data.source;
    for (const [symbol, fixture] of Object.entries(data.stocks)) {
      this.stocks.set(symbolKey(symbol), fixture);
    }
  }

  static fromJson(value: unknown): FileMarketDataProvider {
    const parsed = marketDataFileSchema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigError(`Invalid market data file:\n  - ${issues.join("\n  - ")}`, { issues });
    }
    return new FileMarketDataProvider(parsed.data);
  }

  static async fromFile(path: string): Promise<FileMarketDataProvider> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      throw new ConfigError(`Cannot read market data file ${path}: ${errorMessage(error)}`, { path });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Market data file ${path} is not valid JSON: ${errorMessage(error)}`, { path });
    }

    return FileMarketDataProvider.fromJson(json);
  }

  symbols(): string[] {
    return [...this.stocks.keys()];
  }

  private fixture(symbol: string): StockFixture {
    const fixture = this.stocks.get(symbolKey(symbol));
    if (!fixture) {
      throw new UpstreamDataUnavailableError(this.source, `No market data for ${symbol}`, { context: { symbol } });
    }
    return fixture;
  }

  private signal(kind: string, data: unknown): OptionalSignal | null {
    if (data === undefined || data === null) {
      return null;
    }
    return { source: `${this.source}:${kind}`, data };
  }

  async getDataBundle(symbol: string, period: string): Promise<MarketDataBundle> {
    const fixture = this.fixture(symbol);
    return {
      stockInfo: createStockInfo(fixture.stockInfo),
      period,
      priceSeries: fixture.priceSeries,
      indicators: fixture.indicators,
    };
  }

  async getFinancialData(symbol: string): Promise<FinancialData | null> {
    return this.fixture(symbol).financialData;
  }

  async getQuarterlyData(symbol: string): Promise<OptionalSignal | null> {
    return this.signal("quarterly", this.fixture(symbol).quarterlyData);
  }

  async getFundFlowData(symbol: string): Promise<OptionalSignal | null> {
    return this.signal("fund_flow", this.fixture(symbol).fundFlowData);
  }

  async getSentimentData(symbol: string, priceSeries: readonly PriceBar[]): Promise<OptionalSignal | null> {
    if (priceSeries.length === 0) {
      return null;
    }
    return this.signal("sentiment", this.fixture(symbol).sentimentData);
  }

  async getNewsData(symbol: string): Promise<OptionalSignal | null> {
    return this.signal("news", this.fixture(symbol).newsData);
  }

  async getRiskData(symbol: string): Promise<OptionalSignal | null> {
    return this.signal("risk", this.fixture(symbol).riskData);
  }
}
