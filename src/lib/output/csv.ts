import Papa from "papaparse";
import type { OutputColumn } from "../config/banks";
import type { Transaction } from "../normalize/types";
import { formatAmount } from "../normalize/utils";

export type OutputRecord = Partial<Record<OutputColumn, string>>;

export function toOutputRecord(
  transaction: Transaction,
  columns: readonly OutputColumn[]
): OutputRecord {
  const { amount } = transaction;
  const values: Record<OutputColumn, string> = {
    Date: transaction.date,
    Payee: transaction.payee,
    Memo: transaction.memo,
    Amount: formatAmount(amount),
    Inflow: amount > 0 ? formatAmount(amount) : "",
    Outflow: amount < 0 ? formatAmount(-amount) : "",
    Source: transaction.source,
  };
  const record: OutputRecord = {};
  for (const column of columns) record[column] = values[column];
  return record;
}

export function toCsv(
  transactions: readonly Transaction[],
  columns: readonly OutputColumn[]
): string {
  return Papa.unparse(
    {
      fields: [...columns],
      data: transactions.map((transaction) => {
        const record = toOutputRecord(transaction, columns);
        return columns.map((column) => record[column] ?? "");
      }),
    },
    { newline: "\n" }
  );
}
