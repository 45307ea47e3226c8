/**
 * Parsing for the loosely formatted numbers found in brokerage exports.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface CurrencyParseError {
  input: string;
  reason: string;
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses strings such as "$1,234.56", "-$20.00", "(15.00)" or "12.5".
 * Blank input parses to 0; anything else that is not a plain number is an error.
 *
 * @example
 * ```ts
 * parseCurrency("$1,234.56") // { ok: true, value: 1234.56 }
 * parseCurrency("n/a")       // { ok: false, error: { input: "n/a", reason: "not a number" } }
 * ```
 */
export function parseCurrency(input: string): Result<number, CurrencyParseError> {
  let text = input.replace(/[$,]/g, "").trim();
  if (text === "") {
    return { ok: true, value: 0 };
  }

  let negative = false;
  if (text.startsWith("(") && text.endsWith(")")) {
    negative = true;
    text = text.slice(1, -1).trim();
  }

  if (!NUMERIC_PATTERN.test(text)) {
    return { ok: false, error: { input, reason: "not a number" } };
  }

  const value = Number(text);
  return { ok: true, value: negative ? -value : value };
}

/**
 * Analysis policy: a malformed cell counts as zero instead of failing the whole portfolio.
 */
export function currencyOrZero(input: string | undefined | null): number {
  if (input == null) {
    return 0;
  }
  const result = parseCurrency(input);
  return result.ok ? result.value : 0;
}

/**
 * Strips footnote markers and other punctuation from a ticker.
 *
 * @example
 * ```ts
 * normalizeSymbol("FCASH**") // "FCASH"
 * normalizeSymbol("BRK-B")   // "BRK-B"
 * ```
 */
export function normalizeSymbol(symbol: string | undefined | null): string {
  if (!symbol) {
    return "";
  }
  return symbol.replace(/[^A-Za-z0-9-]/g, "").trim();
}
