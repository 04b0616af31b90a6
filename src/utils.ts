import { mkdir } from "node:fs/promises";
import path from "node:path";

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function parsePositiveInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Like {@link parsePositiveInt} but accepts zero, for settings such as the
 * request delay where "none" is a meaningful value.
 */
export function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

/** Length in Unicode code points, so astral characters count once. */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
