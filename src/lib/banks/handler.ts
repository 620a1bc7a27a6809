import { UnsupportedFormatError, type NormalizationError } from "../errors";
import { readSourceFile, type SourceFile } from "../extractors/types";
import { logger } from "../logger";
import { dedupeTransactions } from "../normalize/dedupe";
import type { Transaction, TransactionBatch } from "../normalize/types";
import type { BankStrategy } from "./strategy";

export type FileReport = {
  filePath: string;
  bankId: string;
  transactions: Transaction[];
  skipped: NormalizationError[];
  ignored: number;
};

export type FileLoader = (filePath: string) => Promise<SourceFile>;

/**
 * Converts files for one bank and keeps every transaction it produced.
 * One handler per bank per run; not shared between concurrent runs.
 */
export class BankHandler {
  private readonly batch: TransactionBatch = [];
  private processed = 0;

  constructor(
    private readonly strategy: BankStrategy,
    private readonly load: FileLoader = readSourceFile
  ) {}

  get bankId(): string {
    return this.strategy.bankId;
  }

  get filesProcessed(): number {
    return this.processed;
  }

  /** Every transaction so far, duplicates across files collapsed. */
  get transactions(): Transaction[] {
    return dedupeTransactions(this.batch);
  }

  async run(filePath: string): Promise<FileReport> {
    const source = await this.load(filePath);
    if (!(await this.strategy.matches(source))) {
      throw new UnsupportedFormatError(filePath, this.bankId);
    }

    const table = await this.strategy.extract(source);
    const { transactions, skipped, ignored } = this.strategy.normalize(table);
    for (const error of skipped) {
      logger.warn(`Skipped ${error.message}`, { bank: this.bankId, file: filePath });
    }

    this.batch.push(...transactions);
    this.processed += 1;
    logger.info(`Parsed ${transactions.length} transaction(s)`, {
      bank: this.bankId,
      file: filePath,
      rows: table.rows.length,
      skipped: skipped.length,
      ignored,
    });

    return { filePath, bankId: this.bankId, transactions, skipped, ignored };
  }
}
