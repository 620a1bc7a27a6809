import iconv from "iconv-lite";
import Papa from "papaparse";
import { ExtractionError } from "../errors";
import { normalizeSpaces } from "../normalize/utils";
import type { RawRow, RawTable, SourceFile, TableExtractor } from "./types";

export type CsvOptions = {
  /** iconv-lite encoding name, or "auto" for UTF-8 with a latin1 fallback. */
  encoding: string;
  delimiter: string;
  headerRows: number;
  footerRows: number;
  hasHeader: boolean;
  /** Rewrites the decoded text before it is split into rows. */
  preprocess?: (text: string) => string;
};

export function decodeText(data: Buffer, encoding: string): string {
  let text: string;
  if (encoding !== "auto") {
    text = iconv.decode(data, encoding);
  } else if (data[0] === 0xff && data[1] === 0xfe) {
    text = iconv.decode(data, "utf-16le");
  } else if (data[0] === 0xfe && data[1] === 0xff) {
    text = iconv.decode(data, "utf-16be");
  } else {
    text = data.toString("utf-8");
    if (text.includes("\uFFFD")) text = iconv.decode(data, "latin1");
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** Drops `headerRows` leading and `footerRows` trailing (non-blank) lines. */
export function trimLines(text: string, headerRows: number, footerRows: number): string {
  const lines = text.split(/\r\n|\r|\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }
  return lines.slice(headerRows, Math.max(headerRows, lines.length - footerRows)).join("\n");
}

function headerKey(name: string): string {
  return normalizeSpaces(name).toLowerCase();
}

/**
 * Names each header cell. Cells matching an expected column (ignoring case
 * and spacing) take the expected spelling; repeated names get " (2)", " (3)".
 */
export function resolveHeader(
  cells: readonly string[],
  expected: readonly string[]
): { columns: string[]; missing: string[] } {
  const wanted = new Map(expected.map((name) => [headerKey(name), name]));
  const used = new Map<string, number>();
  const found = new Set<string>();

  const columns = cells.map((cell, index) => {
    const cleaned = normalizeSpaces(cell) || `Column ${index + 1}`;
    const match = wanted.get(headerKey(cleaned));
    let name = cleaned;
    if (match !== undefined && !found.has(match)) {
      found.add(match);
      name = match;
    }
    const seen = used.get(name) ?? 0;
    used.set(name, seen + 1);
    return seen === 0 ? name : `${name} (${seen + 1})`;
  });

  return {
    columns,
    missing: expected.filter((name) => !found.has(name)),
  };
}

function toRow(columns: readonly string[], cells: readonly string[]): RawRow {
  const row: RawRow = {};
  columns.forEach((column, index) => {
    row[column] = (cells[index] ?? "").trim();
  });
  return row;
}

export function createCsvExtractor(options: CsvOptions): TableExtractor {
  const readText = async (source: SourceFile): Promise<string> => {
    const decoded = decodeText(source.data, options.encoding);
    return options.preprocess ? options.preprocess(decoded) : decoded;
  };

  const readCells = async (source: SourceFile): Promise<string[][]> => {
    const body = trimLines(
      await readText(source),
      options.headerRows,
      options.footerRows
    );
    const result = Papa.parse<string[]>(body, {
      delimiter: options.delimiter,
      skipEmptyLines: "greedy",
    });
    const quoteError = result.errors.find((error) => error.type === "Quotes");
    if (quoteError) {
      const where = quoteError.row === undefined ? "" : ` at row ${quoteError.row + 1}`;
      throw new ExtractionError(
        `Malformed CSV${where}: ${quoteError.message}`,
        source.path
      );
    }
    return result.data;
  };

  const toTable = (
    source: SourceFile,
    cells: string[][],
    expected: readonly string[]
  ): RawTable => {
    if (!options.hasHeader) {
      const columns = [...expected];
      return { columns, rows: cells.map((line) => toRow(columns, line)) };
    }

    const [header, ...data] = cells;
    if (!header) {
      throw new ExtractionError(`${source.path} has no header row`, source.path);
    }
    const { columns, missing } = resolveHeader(header, expected);
    if (missing.length > 0) {
      throw new ExtractionError(
        `${source.path} is missing column(s): ${missing.join(", ")}`,
        source.path
      );
    }
    return { columns, rows: data.map((line) => toRow(columns, line)) };
  };

  return {
    readText,
    async probe(source, expected) {
      try {
        const cells = await readCells(source);
        if (!options.hasHeader) {
          return cells.length > 0 && cells[0].length === expected.length;
        }
        const header = cells[0];
        return header !== undefined && resolveHeader(header, expected).missing.length === 0;
      } catch (error) {
        if (error instanceof ExtractionError) return false;
        throw error;
      }
    },
    async extract(source, expected) {
      return toTable(source, await readCells(source), expected);
    },
  };
}
