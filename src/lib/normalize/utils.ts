export type DecimalSeparator = "." | ",";

const BLANK_AMOUNT_REGEX = /^[\s\-\u2013\u2014]*$/;
// Digits must form one run (with separators); letters may only surround it.
const SINGLE_NUMBER_REGEX = /^[^\d]*\d[\d.,'\u2019\s]*[^\d]*$/;

export function normalizeSpaces(line: string): string {
  return line.replace(/\u00A0/g, " ").replace(/\s+/g, " ").trim();
}

/** Uppercase with every whitespace removed, for layout-tolerant matching. */
export function compactKey(text: string): string {
  return text.replace(/\s+/g, "").toUpperCase();
}

export function isBlankAmount(input: string): boolean {
  return BLANK_AMOUNT_REGEX.test(input);
}

/**
 * Parses a bank-formatted amount. Parentheses and a minus sign anywhere
 * (leading, trailing, after a currency symbol) mean negative. Without an
 * explicit separator, commas are read as decimal points and only the last
 * point is kept, so "1.234,56" and "1,234.56" both give 1234.56.
 *
 * Returns null when the text is not a number.
 */
export function parseAmount(
  input: string,
  decimalSeparator?: DecimalSeparator
): number | null {
  const text = normalizeSpaces(input);
  if (!SINGLE_NUMBER_REGEX.test(text)) return null;

  const compact = text.replace(/[^\d.,()\-]/g, "");
  const negative = compact.includes("-") || /^\(.*\)$/.test(compact);
  let digits = compact.replace(/[()\-]/g, "");

  if (decimalSeparator === ",") {
    digits = digits.replace(/\./g, "").replace(",", ".");
  } else if (decimalSeparator === ".") {
    digits = digits.replace(/,/g, "");
  } else {
    digits = digits.replace(/,/g, ".").replace(/\.(?=.*\.)/g, "");
  }

  if (!/^\d*\.?\d*$/.test(digits) || !/\d/.test(digits)) return null;
  const value = Number(digits);
  if (!Number.isFinite(value)) return null;
  return negative ? -value : value;
}

export function roundAmount(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  // Avoid -0 leaking into output and equality keys.
  return rounded === 0 ? 0 : rounded;
}

export function formatAmount(value: number): string {
  return roundAmount(value).toFixed(2);
}
