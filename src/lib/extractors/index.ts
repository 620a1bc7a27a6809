import type { BankConfig } from "../config/banks";
import { createCsvExtractor } from "./csv";
import { htmlTableToDelimited } from "./html";
import { createPdfExtractor } from "./pdf";
import type { TableExtractor } from "./types";

export function createTableExtractor(config: BankConfig): TableExtractor {
  if (config.format === "pdf") {
    return createPdfExtractor(config.pdf);
  }

  const { delimiter } = config.source;
  return createCsvExtractor({
    encoding: config.source.encoding,
    delimiter,
    headerRows: config.source.headerRows,
    footerRows: config.source.footerRows,
    hasHeader: config.source.hasHeader,
    preprocess:
      config.preprocess === "html-table"
        ? (text) => htmlTableToDelimited(text, delimiter)
        : undefined,
  });
}
