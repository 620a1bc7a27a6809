import { readFile } from "node:fs/promises";
import { ExtractionError } from "../errors";

/** One source row, column name to raw cell text, in column order. */
export type RawRow = Record<string, string>;

export type RawTable = {
  columns: string[];
  rows: RawRow[];
};

export type SourceFile = {
  path: string;
  data: Buffer;
};

export interface TableExtractor {
  /** Whole-file text, used for signature markers. */
  readText: (source: SourceFile) => Promise<string>;
  /** Whether the expected columns can be found; never throws on bad input. */
  probe: (source: SourceFile, expected: readonly string[]) => Promise<boolean>;
  extract: (source: SourceFile, expected: readonly string[]) => Promise<RawTable>;
}

export type LineItem = { text: string; x: number; width: number };
export type PdfLine = { text: string; items: LineItem[] };
export type PdfPage = { number: number; lines: PdfLine[] };

export async function readSourceFile(filePath: string): Promise<SourceFile> {
  try {
    return { path: filePath, data: await readFile(filePath) };
  } catch (error) {
    throw new ExtractionError(`Cannot read ${filePath}`, filePath, {
      cause: error,
    });
  }
}
