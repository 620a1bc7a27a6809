import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import iconv from "iconv-lite";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadBankConfigs, parseBankConfigs, type BankConfigStore } from "@/lib/config/banks";
import { NoMatchingBankError } from "@/lib/errors";
import { matchesSourceName, TransactionFileReader } from "@/lib/reader";

const NORTHWIND = "Date,Description,Debit,Credit,Balance\n01/02/2023,Coffee,3.50,,96.50\n";
const ALPENBANK = iconv.encode(
  "Buchungstag;Empfänger;Verwendungszweck;Betrag;Soll/Haben\n02.01.2024;Miete;Januar;750,00;S\n",
  "windows-1252"
);

describe("matchesSourceName", () => {
  let store: BankConfigStore;

  beforeEach(async () => {
    store = await loadBankConfigs("config/banks.json");
  });

  it("matches a filename prefix and extension", () => {
    const northwind = store.require("northwind-checking");
    expect(matchesSourceName("northwind_jan.csv", northwind)).toBe(true);
    expect(matchesSourceName("northwind_jan.CSV", northwind)).toBe(true);
    expect(matchesSourceName("northwind_jan.txt", northwind)).toBe(false);
    expect(matchesSourceName("jan_northwind_.csv", northwind)).toBe(false);
  });

  it("skips files that were already converted", () => {
    const northwind = store.require("northwind-checking");
    expect(matchesSourceName("northwind_jan_normalized_1.csv", northwind)).toBe(false);
  });

  it("anchors regular expression patterns at the start of the name", () => {
    const harbor = store.require("harbor-credit-union");
    expect(matchesSourceName("Harbor CU export.csv", harbor)).toBe(true);
    expect(matchesSourceName("HarborCU.csv", harbor)).toBe(true);
    expect(matchesSourceName("My Harbor CU.csv", harbor)).toBe(false);
  });

  it("matches nothing without a pattern", () => {
    const config = parseBankConfigs({
      banks: [
        {
          id: "no-pattern",
          name: "No Pattern",
          columns: [
            { source: "Date", field: "date" },
            { source: "Amount", field: "amount" },
          ],
          dateFormat: "yyyy-MM-dd",
          amount: { type: "signed" },
        },
      ],
    }).require("no-pattern");
    expect(matchesSourceName("anything.csv", config)).toBe(false);
  });
});

describe("TransactionFileReader", () => {
  let dir: string;
  let store: BankConfigStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "bank-reader-"));
    store = await loadBankConfigs("config/banks.json");
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("detects the bank of each file", async () => {
    const northwind = path.join(dir, "export-1.csv");
    const alpenbank = path.join(dir, "export-2.csv");
    await writeFile(northwind, NORTHWIND, "utf-8");
    await writeFile(alpenbank, ALPENBANK);
    const reader = new TransactionFileReader(store);

    expect((await reader.detect(northwind)).bankId).toBe("northwind-checking");
    expect((await reader.detect(alpenbank)).bankId).toBe("alpenbank");
  });

  it("fails when no configuration matches", async () => {
    const notes = path.join(dir, "notes.txt");
    await writeFile(notes, "shopping list", "utf-8");
    const reader = new TransactionFileReader(store);

    await expect(reader.detect(notes)).rejects.toThrow(new NoMatchingBankError(notes));
  });

  it("reuses one strategy per bank", () => {
    const reader = new TransactionFileReader(store);
    expect(reader.strategyFor("alpenbank")).toBe(reader.strategyFor("alpenbank"));
  });

  it("finds matching exports in the input directory", async () => {
    await writeFile(path.join(dir, "northwind_jan.csv"), NORTHWIND, "utf-8");
    await writeFile(path.join(dir, "northwind_feb.csv"), NORTHWIND, "utf-8");
    await writeFile(path.join(dir, "normalized_northwind_jan.csv"), "", "utf-8");
    await writeFile(path.join(dir, "other.csv"), NORTHWIND, "utf-8");
    await mkdir(path.join(dir, "northwind_archive.csv"));
    const reader = new TransactionFileReader(store);

    expect(await reader.findFiles(store.require("northwind-checking"), dir)).toEqual([
      path.join(dir, "northwind_feb.csv"),
      path.join(dir, "northwind_jan.csv"),
    ]);
  });

  it("falls back to the input directory when the bank's directory is missing", async () => {
    await writeFile(path.join(dir, "northwind_jan.csv"), NORTHWIND, "utf-8");
    const custom = parseBankConfigs({
      defaults: { output: { prefix: "normalized_" } },
      banks: [
        {
          id: "northwind-checking",
          name: "Northwind Checking",
          source: { filenamePattern: "northwind_", directory: path.join(dir, "missing") },
          columns: [
            { source: "Date", field: "date" },
            { source: "Debit", field: "outflow" },
          ],
          dateFormat: "dd/MM/yyyy",
        },
      ],
    });
    const reader = new TransactionFileReader(custom);

    expect(await reader.findFiles(custom.require("northwind-checking"), dir)).toEqual([
      path.join(dir, "northwind_jan.csv"),
    ]);
    expect(await reader.findFiles(custom.require("northwind-checking"), path.join(dir, "gone"))).toEqual([]);
  });
});
