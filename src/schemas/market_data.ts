import { z } from "zod";

export const priceBarSchema = z.object({
  date: z.string().min(1),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
});

export const stockFixtureSchema = z.object({
  stockInfo: z.object({
    symbol: z.string().min(1),
    name: z.string().default(""),
    sector: z.string().default(""),
    industry: z.string().default(""),
    currentPrice: z.number().nonnegative().default(0),
  }),
  priceSeries: z.array(priceBarSchema).default([]),
  indicators: z.record(z.union([z.number(), z.string(), z.null()])).nullable().default(null),
  financialData: z.record(z.unknown()).nullable().default(null),
  // Optional datasets are opaque to the pipeline; null or missing means "no data".
  quarterlyData: z.unknown().optional(),
  fundFlowData: z.unknown().optional(),
  sentimentData: z.unknown().optional(),
  newsData: z.unknown().optional(),
  riskData: z.unknown().optional(),
});

export const marketDataFileSchema = z.object({
  source: z.string().min(1).default("market-fixture"),
  stocks: z.record(stockFixtureSchema),
});

export type StockFixture = z.infer<typeof stockFixtureSchema>;
export type MarketDataFile = z.infer<typeof marketDataFileSchema>;
