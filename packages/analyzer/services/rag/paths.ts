import { resolve } from "path";
import { fileURLToPath } from "url";

/** packages/analyzer */
export const PACKAGE_ROOT = fileURLToPath(new URL("../../", import.meta.url));

/** Directory where all evaluation reports are saved */
export const REPORTS_DIR = resolve(PACKAGE_ROOT, "evaluation-reports");

/** Cached golden datasets, keyed by seed and size */
export function goldenCachePath(seed: number, size: number): string {
  return resolve(REPORTS_DIR, "golden", `golden-seed${seed}-n${size}.json`);
}

export function resolveCorpusPath(csvPath: string): string {
  return resolve(PACKAGE_ROOT, csvPath);
}
