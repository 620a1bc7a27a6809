import path from "node:path";
import type { BankConfig } from "../config/banks";
import { ExtractionError } from "../errors";
import { createTableExtractor } from "../extractors";
import type { RawTable, SourceFile, TableExtractor } from "../extractors/types";
import { normalizeTable } from "../normalize/dataframe";
import type { NormalizeResult } from "../normalize/types";

export interface BankStrategy {
  bankId: string;
  config: BankConfig;
  matches: (source: SourceFile) => Promise<boolean>;
  extract: (source: SourceFile) => Promise<RawTable>;
  normalize: (table: RawTable) => NormalizeResult;
}

export type StrategyFactory = (config: BankConfig) => BankStrategy;

function hasExtension(filePath: string, extension: string): boolean {
  if (!extension) return true;
  return path.extname(filePath).toLowerCase() === extension.toLowerCase();
}

export function createBankStrategy(
  config: BankConfig,
  extractor: TableExtractor = createTableExtractor(config)
): BankStrategy {
  const expected = config.columns.map((column) => column.source);
  const markers = config.signature.map((marker) => marker.toUpperCase());

  const hasSignature = async (source: SourceFile): Promise<boolean> => {
    if (markers.length === 0) return true;
    try {
      const text = (await extractor.readText(source)).toUpperCase();
      return markers.every((marker) => text.includes(marker));
    } catch (error) {
      if (error instanceof ExtractionError) return false;
      throw error;
    }
  };

  return {
    bankId: config.id,
    config,
    async matches(source) {
      if (!hasExtension(source.path, config.source.extension)) return false;
      if (!(await hasSignature(source))) return false;
      return extractor.probe(source, expected);
    },
    extract: (source) => extractor.extract(source, expected),
    normalize: (table) => normalizeTable(table, config),
  };
}
