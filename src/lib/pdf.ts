import path from "node:path";
import { pathToFileURL } from "node:url";

function pdfJsAssetPath(...segments: string[]): string {
  return path.join(process.cwd(), "node_modules", "pdfjs-dist", ...segments);
}

export function getStandardFontDataUrl(): string {
  return `${pathToFileURL(pdfJsAssetPath("standard_fonts")).toString()}/`;
}

export function getWorkerSrc(): string {
  return pathToFileURL(
    pdfJsAssetPath("legacy", "build", "pdf.worker.min.mjs")
  ).toString();
}
