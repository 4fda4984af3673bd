import { errorMessage } from "../../errors";
import { asRecord } from "./coercion";

export type JsonObjectParse =
  | { ok: true; value: Record<string, unknown>; cleaned: boolean }
  | { ok: false; error: string };

const DOUBLE_QUOTE_VARIANTS = /^[\u201C\u201D\u201E\u201F\u2033\u2036\uFF02\u00AB\u00BB]$/;
const SINGLE_QUOTE_VARIANTS = /^[\u2018\u2019\u201A\u201B\u2032\u2035\uFF07]$/;

/**
 * Slice from the first "{" to the last "}".
 */
export function extractOutermostJsonObject(content: string): string | null {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }

  return content.slice(start, end + 1);
}

export function extractBalancedJsonObject(content: string): string | null {
  const start = content.indexOf("{");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < content.length; i += 1) {
    const ch = content[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return content.slice(start, i + 1);
      }
    }
  }

  return null;
}

type QuoteState = null | { close: "ascii" | "typographic"; quote: '"' | "'" };

function quoteKind(ch: string): { quote: '"' | "'"; typographic: boolean } | null {
  if (ch === '"' || ch === "'") {
    return { quote: ch, typographic: false };
  }
  if (DOUBLE_QUOTE_VARIANTS.test(ch)) {
    return { quote: '"', typographic: true };
  }
  if (SINGLE_QUOTE_VARIANTS.test(ch)) {
    return { quote: "'", typographic: true };
  }
  return null;
}

/**
 * Rewrites typographic quotes that open or close a string. Quotes inside a
 * string opened with a plain quote are content and stay untouched.
 */
export function normalizeStructuralQuotes(candidate: string): string {
  let state: QuoteState = null;
  let escaped = false;
  let out = "";

  for (const ch of candidate) {
    const kind = quoteKind(ch);

    if (state === null) {
      if (kind) {
        state = { close: kind.typographic ? "typographic" : "ascii", quote: kind.quote };
        out += kind.quote;
      } else {
        out += ch;
      }
      continue;
    }

    if (escaped) {
      escaped = false;
      out += ch;
      continue;
    }
    if (ch === "\\") {
      escaped = true;
      out += ch;
      continue;
    }

    const closes =
      kind !== null &&
      kind.quote === state.quote &&
      kind.typographic === (state.close === "typographic");
    if (closes) {
      out += state.quote;
      state = null;
    } else if (state.close === "typographic" && ch === '"' && state.quote === '"') {
      out += `\\${ch}`;
    } else {
      out += ch;
    }
  }

  return out;
}

/**
 * Local syntactic cleanup: typographic string delimiters, single-quoted keys
 * and values, literal True/False/None, trailing commas.
 */
export function cleanupJsonText(candidate: string): string {
  return normalizeStructuralQuotes(candidate)
    .replace(/\bTrue\b/g, "true")
    .replace(/\bFalse\b/g, "false")
    .replace(/\bNone\b/g, "null")
    .replace(/([{,]\s*)'([^'\\]*(?:\\.[^'\\]*)*)'\s*:/g, '$1"$2":')
    .replace(/:\s*'([^'\\]*(?:\\.[^'\\]*)*)'/g, ': "$1"')
    .replace(/,\s*([}\]])/g, "$1");
}

function parseObject(candidate: string): JsonObjectParse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const record = asRecord(parsed);
  if (!record) {
    return { ok: false, error: "parsed JSON is not an object" };
  }
  return { ok: true, value: record, cleaned: false };
}

/**
 * Parses the outermost JSON object in free text. A strict attempt runs first;
 * on failure the candidates are cleaned up locally and retried. The returned
 * error is the strict attempt's message.
 */
export function parseJsonObject(content: string): JsonObjectParse {
  const outermost = extractOutermostJsonObject(content);
  if (outermost === null) {
    return { ok: false, error: "no JSON object found in text" };
  }

  const strict = parseObject(outermost);
  if (strict.ok) {
    return strict;
  }

  const candidates = [outermost, extractBalancedJsonObject(content)].filter(
    (candidate): candidate is string => candidate !== null,
  );
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const cleaned = cleanupJsonText(candidate);
    if (seen.has(cleaned)) {
      continue;
    }
    seen.add(cleaned);

    const attempt = parseObject(cleaned);
    if (attempt.ok) {
      return { ok: true, value: attempt.value, cleaned: true };
    }
  }

  return strict;
}
