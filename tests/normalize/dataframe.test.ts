import { describe, expect, it } from "vitest";
import { parseBankConfigs, type BankConfig } from "@/lib/config/banks";
import { NormalizationError } from "@/lib/errors";
import type { RawRow } from "@/lib/extractors/types";
import { mapColumns, normalizeTable, resolveAmount } from "@/lib/normalize/dataframe";
import { dedupeTransactions } from "@/lib/normalize/dedupe";

function bank(entry: Record<string, unknown>): BankConfig {
  return parseBankConfigs({
    banks: [{ id: "test-bank", name: "Test Bank", ...entry }],
  }).require("test-bank");
}

function table(rows: RawRow[]) {
  return { columns: Object.keys(rows[0] ?? {}), rows };
}

const splitBank = bank({
  columns: [
    { source: "Date", field: "date" },
    { source: "Description", field: "payee" },
    { source: "Debit", field: "outflow" },
    { source: "Credit", field: "inflow" },
  ],
  dateFormat: "dd/MM/yyyy",
  amount: { type: "split" },
});

const coffee: RawRow = {
  Date: "01/02/2023",
  Description: "Coffee",
  Debit: "3.50",
  Credit: "",
};

describe("mapColumns", () => {
  it("merges columns mapped to one field and drops skipped ones", () => {
    const mapped = mapColumns(
      { Text1: "Coffee", Text2: " Shop ", Balance: "5.00" },
      [
        { source: "Text1", field: "payee" },
        { source: "Text2", field: "payee" },
        { source: "Balance", field: "skip" },
      ]
    );
    expect(mapped).toEqual({ payee: "Coffee Shop" });
  });
});

describe("resolveAmount", () => {
  it("subtracts outflow from inflow and treats a blank side as zero", () => {
    expect(resolveAmount({ inflow: "10.00", outflow: "" }, { type: "split" }, 1)).toBe(10);
    expect(resolveAmount({ inflow: "", outflow: "" }, { type: "split" }, 1)).toBeNull();
  });

  it("inverts signed amounts on request", () => {
    expect(resolveAmount({ amount: "-3.50" }, { type: "signed", invert: true }, 1)).toBe(3.5);
  });

  it("keeps the magnitude when the flag has no credit value configured", () => {
    expect(resolveAmount({ amount: "5", flag: "X" }, { type: "flag", debit: "D" }, 1)).toBe(5);
  });
});

describe("normalizeTable", () => {
  it("maps a debit column to a negative amount", () => {
    const result = normalizeTable(table([coffee]), splitBank);

    expect(result.transactions).toEqual([
      { date: "2023-02-01", payee: "Coffee", memo: "", amount: -3.5, source: "test-bank" },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it("skips a row with an unparseable date and keeps the rest", () => {
    const result = normalizeTable(
      table([coffee, { Date: "N/A", Description: "Refund", Debit: "", Credit: "10.00" }]),
      splitBank
    );

    expect(result.transactions).toHaveLength(1);
    expect(result.skipped).toHaveLength(1);
    const [error] = result.skipped;
    expect(error).toBeInstanceOf(NormalizationError);
    expect(error.row).toBe(2);
    expect(error.field).toBe("date");
    expect(error.message).toBe('row 2: date "N/A" does not match dd/MM/yyyy');
  });

  it("skips a row with an invalid amount", () => {
    const result = normalizeTable(table([{ ...coffee, Debit: "abc" }]), splitBank);

    expect(result.transactions).toEqual([]);
    expect(result.skipped.map((error) => error.message)).toEqual([
      'row 1: amount "abc" is not a valid number',
    ]);
  });

  it("skips a row with an unparseable amount and keeps the rest", () => {
    const result = normalizeTable(
      table([{ ...coffee, Debit: "N/A" }, { ...coffee, Description: "Bakery", Debit: "2.10" }]),
      splitBank
    );

    expect(result.transactions).toEqual([
      { date: "2023-02-01", payee: "Bakery", memo: "", amount: -2.1, source: "test-bank" },
    ]);
    expect(result.skipped).toHaveLength(1);
    const [error] = result.skipped;
    expect(error).toBeInstanceOf(NormalizationError);
    expect(error.field).toBe("amount");
    expect(error.value).toBe("N/A");
    expect(error.message).toBe('row 1: amount "N/A" is not a valid number');
  });

  it("ignores rows without an amount or with a zero amount", () => {
    const result = normalizeTable(
      table([
        { Date: "01/02/2023", Description: "Balance brought forward", Debit: "", Credit: "" },
        { ...coffee, Debit: "0.00" },
        coffee,
      ]),
      splitBank
    );

    expect(result.ignored).toBe(2);
    expect(result.transactions).toHaveLength(1);
  });

  it("collapses exact duplicates and is idempotent", () => {
    const result = normalizeTable(table([coffee, coffee, { ...coffee, Debit: "4.00" }]), splitBank);

    expect(result.transactions.map((tx) => tx.amount)).toEqual([-3.5, -4]);
    expect(dedupeTransactions(result.transactions)).toEqual(result.transactions);
  });

  it("produces the same batch for the same input", () => {
    const rows = [coffee, { ...coffee, Description: "Bakery", Debit: "2.10" }];
    expect(normalizeTable(table(rows), splitBank)).toEqual(normalizeTable(table(rows), splitBank));
  });

  it("applies debit and credit flags", () => {
    const config = bank({
      columns: [
        { source: "Buchungstag", field: "date" },
        { source: "Empfänger", field: "payee" },
        { source: "Betrag", field: "amount" },
        { source: "Soll/Haben", field: "flag" },
      ],
      dateFormat: "dd.MM.yyyy",
      decimalSeparator: ",",
      amount: { type: "flag", debit: "S", credit: "H" },
    });
    const result = normalizeTable(
      table([
        { Buchungstag: "02.01.2024", Empfänger: "Miete", Betrag: "750,00", "Soll/Haben": "S" },
        { Buchungstag: "03.01.2024", Empfänger: "Gehalt", Betrag: "1.200,50", "Soll/Haben": "h" },
        { Buchungstag: "04.01.2024", Empfänger: "Unklar", Betrag: "5,00", "Soll/Haben": "X" },
      ]),
      config
    );

    expect(result.transactions.map((tx) => [tx.payee, tx.amount])).toEqual([
      ["Miete", -750],
      ["Gehalt", 1200.5],
    ]);
    expect(result.skipped.map((error) => error.message)).toEqual([
      'row 3: flag "X" is neither "S" nor "H"',
    ]);
  });

  it("forward-fills empty dates when configured", () => {
    const entry = {
      columns: [
        { source: "Date", field: "date" },
        { source: "Details", field: "payee" },
        { source: "Amount", field: "amount" },
      ],
      dateFormat: "dd MMM yyyy",
      amount: { type: "signed" },
    };
    const rows = [
      { Date: "03 Jan 2024", Details: "Grocer", Amount: "-20.00" },
      { Date: "", Details: "Pharmacy", Amount: "-8.00" },
    ];

    const filled = normalizeTable(table(rows), bank({ ...entry, fillEmptyDates: true }));
    expect(filled.transactions.map((tx) => tx.date)).toEqual(["2024-01-03", "2024-01-03"]);

    const unfilled = normalizeTable(table(rows), bank(entry));
    expect(unfilled.skipped.map((error) => error.message)).toEqual([
      'row 2: date "" is missing',
    ]);
  });

  it("fills payee and memo from each other", () => {
    const config = bank({
      columns: [
        { source: "Date", field: "date" },
        { source: "Payee", field: "payee" },
        { source: "Memo", field: "memo" },
        { source: "Amount", field: "amount" },
      ],
      dateFormat: "yyyy-MM-dd",
      payeeToMemo: true,
      amount: { type: "signed" },
    });
    const result = normalizeTable(
      table([
        { Date: "2024-03-01", Payee: "Coffee", Memo: "", Amount: "-3.00" },
        { Date: "2024-03-02", Payee: "", Memo: "Card 1234", Amount: "-4.00" },
      ]),
      config
    );

    expect(result.transactions.map((tx) => [tx.payee, tx.memo])).toEqual([
      ["Coffee", "Coffee"],
      ["Card 1234", "Card 1234"],
    ]);
  });

  it("divides by the currency multiplier", () => {
    const config = bank({
      columns: [
        { source: "Date", field: "date" },
        { source: "Amount", field: "amount" },
      ],
      dateFormat: "yyyy-MM-dd",
      currencyMultiplier: 100,
      amount: { type: "signed" },
    });
    const result = normalizeTable(table([{ Date: "2024-03-01", Amount: "-350" }]), config);

    expect(result.transactions[0].amount).toBe(-3.5);
  });
});
