import type { FinancialData, IndicatorValues, OptionalSignal, PriceBar } from "../../market/types";
import { asBoolean, asRecord, asString } from "./coercion";

const SIGNAL_CHAR_BUDGET = 4_000;
const RECENT_PRICE_COUNT = 10;

const FINANCIAL_RATIO_GROUPS: ReadonlyArray<{ title: string; keys: ReadonlyArray<[string, string]> }> = [
  {
    title: "Valuation",
    keys: [
      ["pe_ratio", "P/E"],
      ["pb_ratio", "P/B"],
      ["total_market_cap", "Total market cap"],
      ["circulating_market_cap", "Float market cap"],
      ["eps", "EPS"],
      ["bvps", "Book value per share"],
    ],
  },
  {
    title: "Profitability",
    keys: [
      ["roe", "ROE"],
      ["roa", "ROA"],
      ["gross_margin", "Gross margin"],
      ["net_margin", "Net margin"],
    ],
  },
  {
    title: "Growth",
    keys: [
      ["revenue_growth_yoy", "Revenue growth YoY"],
      ["net_profit_growth_yoy", "Net profit growth YoY"],
    ],
  },
  {
    title: "Solvency",
    keys: [
      ["debt_to_asset", "Debt to assets"],
      ["current_ratio", "Current ratio"],
    ],
  },
];

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatValue(value: unknown): string | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? formatNumber(value) : null;
  }
  return asString(value);
}

export function indicatorValue(indicators: IndicatorValues | null, key: string): string | null {
  if (!indicators) {
    return null;
  }
  return formatValue(indicators[key]);
}

export function formatRecentPrices(series: readonly PriceBar[], count = RECENT_PRICE_COUNT): string | null {
  if (series.length === 0) {
    return null;
  }

  return series
    .slice(-count)
    .map((bar) => `${bar.date}: close ${formatNumber(bar.close)}, volume ${formatNumber(bar.volume)}`)
    .join("\n");
}

function isEmptyPayload(data: unknown): boolean {
  if (data === null || data === undefined) {
    return true;
  }
  if (typeof data === "string") {
    return data.trim().length === 0;
  }
  if (Array.isArray(data)) {
    return data.length === 0;
  }
  const record = asRecord(data);
  return record !== null && Object.keys(record).length === 0;
}

/**
 * A signal counts as absent when it is null, empty, or flagged `data_success: false`.
 */
export function isUsableSignal(signal: OptionalSignal | null): signal is OptionalSignal {
  if (!signal || isEmptyPayload(signal.data)) {
    return false;
  }

  const record = asRecord(signal.data);
  return !(record && asBoolean(record.data_success) === false);
}

export function truncate(text: string, budget: number): string {
  return text.length > budget ? `${text.slice(0, budget)}\n...(truncated)` : text;
}

export function formatSignal(signal: OptionalSignal | null, budget = SIGNAL_CHAR_BUDGET): string | null {
  if (!isUsableSignal(signal)) {
    return null;
  }

  const text = typeof signal.data === "string" ? signal.data.trim() : JSON.stringify(signal.data, null, 2);
  return truncate(`Source: ${signal.source}\n${text}`, budget);
}

export function formatFinancialRatios(financialData: FinancialData | null): string | null {
  if (!financialData) {
    return null;
  }

  const ratios = asRecord(financialData.financial_ratios) ?? financialData;
  const sections: string[] = [];

  for (const group of FINANCIAL_RATIO_GROUPS) {
    const lines = group.keys.flatMap(([key, label]) => {
      const value = formatValue(ratios[key]);
      return value === null ? [] : [`- ${label}: ${value}`];
    });
    if (lines.length > 0) {
      sections.push(`${group.title}:\n${lines.join("\n")}`);
    }
  }

  return sections.length > 0 ? sections.join("\n\n") : null;
}
