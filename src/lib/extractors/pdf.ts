import { ExtractionError } from "../errors";
import { compactKey, normalizeSpaces } from "../normalize/utils";
import { readPdfPages } from "../pdfjs";
import type {
  PdfLine,
  PdfPage,
  RawRow,
  RawTable,
  SourceFile,
  TableExtractor,
} from "./types";

export type PdfTableOptions = {
  /** A line containing one of these (spacing and case ignored) ends the table. */
  endMarkers: readonly string[];
  /** Regular expressions (case-insensitive) for lines to drop, such as page footers. */
  ignorePatterns: readonly string[];
};

export type PageReader = (data: Uint8Array) => Promise<PdfPage[]>;

type ColumnAnchor = { name: string; x: number };

function matchRun(
  keys: readonly string[],
  line: PdfLine,
  key: string,
  used: Set<number>
): number | null {
  for (let start = 0; start < keys.length; start += 1) {
    let joined = "";
    for (let end = start; end < keys.length && !used.has(end); end += 1) {
      joined += keys[end];
      if (!key.startsWith(joined)) break;
      if (joined === key) {
        for (let index = start; index <= end; index += 1) used.add(index);
        return line.items[start].x;
      }
    }
  }
  return null;
}

// pdfjs sometimes emits a whole header as one item; estimate the column
// start from the character offset.
function matchInside(
  keys: readonly string[],
  line: PdfLine,
  key: string,
  used: Set<number>
): number | null {
  for (let index = 0; index < keys.length; index += 1) {
    if (used.has(index)) continue;
    const offset = keys[index].indexOf(key);
    if (offset === -1) continue;
    const item = line.items[index];
    return item.x + (item.width * offset) / keys[index].length;
  }
  return null;
}

/** Column anchors when every expected name appears in the line. */
export function findHeader(
  line: PdfLine,
  expected: readonly string[]
): ColumnAnchor[] | null {
  const keys = line.items.map((item) => compactKey(item.text));
  const used = new Set<number>();
  const anchors: ColumnAnchor[] = [];
  const byLength = [...expected].sort(
    (a, b) => compactKey(b).length - compactKey(a).length
  );

  for (const name of byLength) {
    const key = compactKey(name);
    const x = matchRun(keys, line, key, used) ?? matchInside(keys, line, key, used);
    if (x === null) return null;
    anchors.push({ name, x });
  }
  return anchors.sort((a, b) => a.x - b.x);
}

function splitCells(line: PdfLine, anchors: readonly ColumnAnchor[]): RawRow {
  const parts = anchors.map((): string[] => []);
  for (const item of line.items) {
    let column = 0;
    for (let index = 1; index < anchors.length; index += 1) {
      const boundary = (anchors[index - 1].x + anchors[index].x) / 2;
      if (item.x >= boundary) column = index;
    }
    parts[column].push(item.text);
  }
  const row: RawRow = {};
  anchors.forEach((anchor, index) => {
    row[anchor.name] = normalizeSpaces(parts[index].join(" "));
  });
  return row;
}

function appendTo(row: RawRow, column: string, text: string): void {
  row[column] = row[column] ? `${row[column]} ${text}` : text;
}

/**
 * Cuts the transaction table out of positioned PDF lines. Returns null when
 * no page carries a header with every expected column.
 */
export function locateTable(
  pages: readonly PdfPage[],
  expected: readonly string[],
  options: PdfTableOptions
): RawTable | null {
  const endKeys = options.endMarkers.map(compactKey);
  const ignore = options.ignorePatterns.map((pattern) => new RegExp(pattern, "i"));
  const rows: RawRow[] = [];
  let anchors: ColumnAnchor[] | null = null;
  let open = false;
  let current: RawRow | null = null;

  for (const page of pages) {
    const headers = page.lines.map((line) => findHeader(line, expected));
    // Anything above a repeated header is page chrome. The last row stays
    // current so text carried over the page break still reaches it.
    if (headers.some((header) => header !== null)) open = false;

    for (const [index, line] of page.lines.entries()) {
      const header = headers[index];
      if (header) {
        anchors = header;
        open = true;
        continue;
      }
      if (!open || !anchors) continue;

      const key = compactKey(line.text);
      if (endKeys.some((marker) => key.includes(marker))) {
        open = false;
        current = null;
        continue;
      }
      if (ignore.some((pattern) => pattern.test(line.text))) continue;

      const cells = splitCells(line, anchors);
      const filled = anchors.filter((anchor) => cells[anchor.name] !== "");
      if (filled.length === 0) continue;
      if (filled.length === 1 && filled[0].name !== anchors[0].name) {
        if (current) appendTo(current, filled[0].name, cells[filled[0].name]);
        continue;
      }
      current = cells;
      rows.push(cells);
    }
  }

  if (!anchors) return null;
  return { columns: [...expected], rows };
}

export function createPdfExtractor(
  options: PdfTableOptions,
  readPages: PageReader = readPdfPages
): TableExtractor {
  const cache = new WeakMap<SourceFile, Promise<PdfPage[]>>();

  const pagesOf = (source: SourceFile): Promise<PdfPage[]> => {
    const cached = cache.get(source);
    if (cached) return cached;
    const pending = readPages(source.data).catch((error: unknown) => {
      throw new ExtractionError(`Cannot read PDF ${source.path}`, source.path, {
        cause: error,
      });
    });
    cache.set(source, pending);
    return pending;
  };

  return {
    async readText(source) {
      const pages = await pagesOf(source);
      return pages
        .flatMap((page) => page.lines.map((line) => line.text))
        .join("\n");
    },
    async probe(source, expected) {
      try {
        const pages = await pagesOf(source);
        return pages.some((page) =>
          page.lines.some((line) => findHeader(line, expected) !== null)
        );
      } catch (error) {
        if (error instanceof ExtractionError) return false;
        throw error;
      }
    },
    async extract(source, expected) {
      const table = locateTable(await pagesOf(source), expected, options);
      if (!table) {
        throw new ExtractionError(
          `${source.path} has no table header with ${expected.join(", ")}`,
          source.path
        );
      }
      return table;
    },
  };
}
