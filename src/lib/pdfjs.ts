import DOMMatrix from "dommatrix";
import type { LineItem, PdfLine, PdfPage } from "./extractors/types";
import { normalizeSpaces } from "./normalize/utils";
import { getStandardFontDataUrl, getWorkerSrc } from "./pdf";

const globalAny = globalThis as typeof globalThis & {
  DOMMatrix?: typeof DOMMatrix;
  ImageData?: unknown;
  Path2D?: unknown;
};

export async function loadPdfJs() {
  if (!globalAny.DOMMatrix) {
    globalAny.DOMMatrix = DOMMatrix;
  }
  if (!globalAny.ImageData) {
    const ImageDataPolyfill = class ImageData {
      data: Uint8ClampedArray;
      width: number;
      height: number;
      constructor(
        data: Uint8ClampedArray,
        width: number,
        height: number
      ) {
        this.data = data;
        this.width = width;
        this.height = height;
      }
    };
    globalAny.ImageData = ImageDataPolyfill;
  }
  if (!globalAny.Path2D) {
    globalAny.Path2D = class Path2D {};
  }
  return import("pdfjs-dist/legacy/build/pdf.mjs");
}

// Items whose baselines are within this many points share a line.
const LINE_TOLERANCE = 2;

/**
 * Reads every page into lines of positioned text items, top to bottom,
 * left to right.
 */
export async function readPdfPages(data: Uint8Array): Promise<PdfPage[]> {
  const { getDocument, GlobalWorkerOptions } = await loadPdfJs();
  GlobalWorkerOptions.workerSrc = getWorkerSrc();
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    standardFontDataUrl: getStandardFontDataUrl(),
    isEvalSupported: false,
    verbosity: 0,
  });
  const pdf = await loadingTask.promise.catch(async (error: unknown) => {
    await loadingTask.destroy();
    throw error;
  });
  const pages: PdfPage[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum += 1) {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      const lineMap = new Map<number, LineItem[]>();

      for (const item of content.items) {
        if (!("str" in item) || item.str.trim() === "") continue;
        const x: number = item.transform[4];
        const y: number = item.transform[5];
        const yKey = Math.round(y / LINE_TOLERANCE) * LINE_TOLERANCE;
        const bucket = lineMap.get(yKey) ?? [];
        bucket.push({ text: item.str, x, width: item.width });
        lineMap.set(yKey, bucket);
      }

      const lines: PdfLine[] = [...lineMap.entries()]
        .sort((a, b) => b[0] - a[0])
        .map(([, items]) => {
          const sorted = items.sort((a, b) => a.x - b.x);
          const text = normalizeSpaces(sorted.map((it) => it.text).join(" "));
          return { text, items: sorted };
        })
        .filter((line) => line.text.length > 0);

      pages.push({ number: pageNum, lines });
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  return pages;
}
