import Papa from "papaparse";
import { normalizeSpaces } from "../normalize/utils";

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00A0",
};

const CELL_REGEX = /<t[dh]\b[^>]*>([\s\S]*?)<\/t[dh]\s*>/gi;

export function decodeEntities(text: string): string {
  return text.replace(/&(#\d+|#x[\da-f]+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith("#")) {
      return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function cellText(html: string): string {
  return normalizeSpaces(decodeEntities(html.replace(/<[^>]*>/g, " ")));
}

/**
 * Some banks save an HTML table under a spreadsheet name, one row per line.
 * Keeps the text of every `<td>`/`<th>` cell and re-emits the rows as
 * delimited text; lines without cells (markup, blank lines) are dropped and
 * lines without any markup pass through unchanged.
 */
export function htmlTableToDelimited(text: string, delimiter: string): string {
  const rows: string[][] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    if (!line.includes("<")) {
      if (!line.trim()) continue;
      const [cells = []] = Papa.parse<string[]>(line, { delimiter }).data;
      rows.push(cells.map(normalizeSpaces));
      continue;
    }
    const cells = [...line.matchAll(CELL_REGEX)].map((match) => cellText(match[1]));
    if (cells.some((cell) => cell.length > 0)) rows.push(cells);
  }
  return Papa.unparse(rows, { delimiter, newline: "\n" });
}
