import type { NormalizationError } from "../errors";

/** Canonical transaction record shared by every bank format. */
export type Transaction = {
  /** ISO calendar date, YYYY-MM-DD. */
  date: string;
  payee: string;
  memo: string;
  /** Signed, two fraction digits; outflows are negative. */
  amount: number;
  /** Id of the bank configuration the row came from. */
  source: string;
};

export type TransactionBatch = Transaction[];

export type NormalizeResult = {
  transactions: TransactionBatch;
  skipped: NormalizationError[];
  /** Rows carrying no amount at all (headings, balance lines). */
  ignored: number;
};
