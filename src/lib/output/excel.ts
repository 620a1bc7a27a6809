import ExcelJS from "exceljs";
import type { OutputColumn } from "../config/banks";
import type { Transaction } from "../normalize/types";
import { roundAmount } from "../normalize/utils";

const COLUMN_WIDTHS: Record<OutputColumn, number> = {
  Date: 12,
  Payee: 40,
  Memo: 60,
  Amount: 14,
  Inflow: 14,
  Outflow: 14,
  Source: 20,
};

const AMOUNT_COLUMNS: readonly OutputColumn[] = ["Amount", "Inflow", "Outflow"];

type CellValue = string | number | null;

function cellValues(transaction: Transaction): Record<OutputColumn, CellValue> {
  const amount = roundAmount(transaction.amount);
  return {
    Date: transaction.date,
    Payee: transaction.payee,
    Memo: transaction.memo,
    Amount: amount,
    Inflow: amount > 0 ? amount : null,
    Outflow: amount < 0 ? -amount : null,
    Source: transaction.source,
  };
}

export async function buildWorkbook(
  transactions: readonly Transaction[],
  columns: readonly OutputColumn[]
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("Transactions");

  worksheet.columns = columns.map((column) => ({
    header: column,
    key: column,
    width: COLUMN_WIDTHS[column],
  }));

  for (const column of columns) {
    if (AMOUNT_COLUMNS.includes(column)) {
      worksheet.getColumn(column).numFmt = "0.00";
    }
  }

  for (const transaction of transactions) {
    const values = cellValues(transaction);
    const row: Partial<Record<OutputColumn, CellValue>> = {};
    for (const column of columns) row[column] = values[column];
    worksheet.addRow(row);
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
