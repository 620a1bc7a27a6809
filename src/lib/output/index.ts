import { writeFile } from "node:fs/promises";
import type { OutputColumn } from "../config/banks";
import type { OutputFormat } from "../config/env";
import type { Transaction } from "../normalize/types";
import { toCsv } from "./csv";
import { buildWorkbook } from "./excel";

export async function writeTransactions(
  filePath: string,
  transactions: readonly Transaction[],
  columns: readonly OutputColumn[],
  format: OutputFormat
): Promise<void> {
  if (format === "xlsx") {
    await writeFile(filePath, await buildWorkbook(transactions, columns));
    return;
  }
  await writeFile(filePath, `${toCsv(transactions, columns)}\n`, "utf-8");
}

export { getOutputPath } from "./path";
export { toCsv, toOutputRecord } from "./csv";
export { buildWorkbook } from "./excel";
