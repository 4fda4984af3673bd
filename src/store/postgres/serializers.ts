import { asNumber, asRecord, asString } from "../../agents/base_utils/coercion";
import { createStockInfo, type StockInfo } from "../../workflow/states";

export function toText(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

export function toIsoTimestamp(value: unknown): string {
  if (!value) {
    return "";
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "string") {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }

  return "";
}

/**
 * JSONB columns come back parsed from pg, but text copies may still be strings.
 */
function fromJson(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }

  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

export function toStringArray(value: unknown): string[] {
  const parsed = fromJson(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((entry): entry is string => typeof entry === "string");
}

export function toJsonObject(value: unknown): Record<string, unknown> | null {
  return asRecord(fromJson(value));
}

export function toStockInfo(value: unknown, fallbackSymbol: string, fallbackName: string): StockInfo {
  const record = toJsonObject(value) ?? {};
  return createStockInfo({
    symbol: asString(record.symbol) ?? fallbackSymbol,
    name: asString(record.name) ?? fallbackName,
    sector: asString(record.sector) ?? "",
    industry: asString(record.industry) ?? "",
    currentPrice: asNumber(record.currentPrice) ?? 0,
  });
}
