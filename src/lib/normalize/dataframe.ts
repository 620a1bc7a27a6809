import type {
  AmountRule,
  BankConfig,
  CanonicalField,
  ColumnMapping,
} from "../config/banks";
import { NormalizationError } from "../errors";
import type { RawRow, RawTable } from "../extractors/types";
import { parseDate } from "./dates";
import { dedupeTransactions } from "./dedupe";
import type { NormalizeResult, Transaction } from "./types";
import {
  isBlankAmount,
  normalizeSpaces,
  parseAmount,
  roundAmount,
  type DecimalSeparator,
} from "./utils";

export type MappedRow = Partial<Record<CanonicalField, string>>;

/**
 * Renames source columns to canonical fields. Unmapped and `skip` columns
 * are dropped; several columns mapped to one field are space-joined in
 * column order.
 */
export function mapColumns(row: RawRow, columns: readonly ColumnMapping[]): MappedRow {
  const mapped: MappedRow = {};
  for (const { source, field } of columns) {
    if (field === "skip") continue;
    const value = normalizeSpaces(row[source] ?? "");
    const previous = mapped[field];
    mapped[field] = previous ? normalizeSpaces(`${previous} ${value}`) : value;
  }
  return mapped;
}

function readAmount(
  raw: string | undefined,
  row: number,
  separator: DecimalSeparator | undefined
): number | null {
  if (raw === undefined || isBlankAmount(raw)) return null;
  const value = parseAmount(raw, separator);
  if (value === null) {
    throw new NormalizationError(row, "amount", raw, "is not a valid number");
  }
  return value;
}

/**
 * Applies the bank's sign rule. Returns null for rows that carry no amount
 * value at all.
 */
export function resolveAmount(
  mapped: MappedRow,
  rule: AmountRule,
  row: number,
  separator?: DecimalSeparator
): number | null {
  switch (rule.type) {
    case "signed": {
      const value = readAmount(mapped.amount, row, separator);
      if (value === null) return null;
      return rule.invert ? -value : value;
    }
    case "split": {
      const inflow = readAmount(mapped.inflow, row, separator);
      const outflow = readAmount(mapped.outflow, row, separator);
      if (inflow === null && outflow === null) return null;
      return (inflow ?? 0) - (outflow ?? 0);
    }
    case "flag": {
      const value = readAmount(mapped.amount, row, separator);
      if (value === null) return null;
      const flag = normalizeSpaces(mapped.flag ?? "").toUpperCase();
      if (flag === rule.debit.toUpperCase()) return -Math.abs(value);
      if (rule.credit === undefined) return value;
      if (flag === rule.credit.toUpperCase()) return Math.abs(value);
      throw new NormalizationError(
        row,
        "flag",
        mapped.flag ?? "",
        `is neither "${rule.debit}" nor "${rule.credit}"`
      );
    }
  }
}

/**
 * Turns an extracted table into canonical transactions for one bank.
 * A row that fails to parse is skipped and reported; it never aborts the
 * rest of the table.
 */
export function normalizeTable(table: RawTable, config: BankConfig): NormalizeResult {
  const transactions: Transaction[] = [];
  const skipped: NormalizationError[] = [];
  let ignored = 0;
  let lastDate: string | null = null;

  table.rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const mapped = mapColumns(row, config.columns);
    const rawDate = mapped.date ?? "";

    let date: string | null = null;
    if (rawDate) {
      date = parseDate(rawDate, config.dateFormat);
      if (date) lastDate = date;
    } else if (config.fillEmptyDates) {
      date = lastDate;
    }

    try {
      const value = resolveAmount(
        mapped,
        config.amount,
        rowNumber,
        config.decimalSeparator
      );
      const amount = value === null ? 0 : roundAmount(value / config.currencyMultiplier);
      if (amount === 0) {
        ignored += 1;
        return;
      }

      if (!date) {
        throw new NormalizationError(
          rowNumber,
          "date",
          rawDate,
          rawDate
            ? `does not match ${config.dateFormat.join(" or ")}`
            : "is missing"
        );
      }

      let payee = mapped.payee ?? "";
      let memo = mapped.memo ?? "";
      if (config.payeeToMemo && !memo) memo = payee;
      if (!payee) payee = memo;

      transactions.push({ date, payee, memo, amount, source: config.id });
    } catch (error) {
      if (error instanceof NormalizationError) {
        skipped.push(error);
        return;
      }
      throw error;
    }
  });

  return {
    transactions: dedupeTransactions(transactions),
    skipped,
    ignored,
  };
}
