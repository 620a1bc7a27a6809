import { existsSync } from "node:fs";
import path from "node:path";

/**
 * `<dir>/<prefix><stem><extension>` beside the input; `_1`, `_2`, ... is
 * appended to the stem until the name is free.
 */
export function getOutputPath(
  inputPath: string,
  prefix: string,
  extension: string,
  exists: (candidate: string) => boolean = existsSync
): string {
  const { dir, name } = path.parse(inputPath);
  const base = `${prefix}${name}`;
  let candidate = path.join(dir, `${base}${extension}`);
  for (let counter = 1; exists(candidate); counter += 1) {
    candidate = path.join(dir, `${base}_${counter}${extension}`);
  }
  return candidate;
}
