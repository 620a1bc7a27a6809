import type { Transaction } from "./types";

export function transactionKey(transaction: Transaction): string {
  return JSON.stringify([
    transaction.date,
    transaction.payee,
    transaction.memo,
    transaction.amount,
    transaction.source,
  ]);
}

/** Keeps the first of each group of rows equal in every canonical field. */
export function dedupeTransactions(
  transactions: readonly Transaction[]
): Transaction[] {
  const seen = new Set<string>();
  return transactions.filter((transaction) => {
    const key = transactionKey(transaction);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
