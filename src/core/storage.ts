// src/core/storage.ts
import { promises as fs } from "node:fs";
import path from "node:path";
import { PersistenceError } from "./errors";

export function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/** Reads and parses a JSON file, or null when it does not exist */
export async function readJsonFile(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isNotFound(e)) return null;
    throw new PersistenceError("Could not read file", file, e);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new PersistenceError("File is not valid JSON", file, e);
  }
}

export const toJson = (value: unknown): string =>
  `${JSON.stringify(value, null, 2)}\n`;

/**
 * Writes through a temp file in the same directory and renames it over the
 * target, so readers see either the old or the new content.
 */
export async function writeFileAtomic(
  file: string,
  content: string,
): Promise<void> {
  const tmp = path.join(
    path.dirname(file),
    `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`,
  );
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, file);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch(() => undefined);
    throw new PersistenceError("Could not write file", file, e);
  }
}

export async function writeJsonAtomic(
  file: string,
  value: unknown,
): Promise<void> {
  await writeFileAtomic(file, toJson(value));
}

const discard = (dir: string) =>
  fs.rm(dir, { recursive: true, force: true }).catch(() => undefined);

/**
 * Fills a fresh sibling directory through `populate`, then swaps it in
 * place of `dir`. The previous directory is only removed after the swap.
 */
export async function replaceDirectory(
  dir: string,
  populate: (stagingDir: string) => Promise<void>,
): Promise<void> {
  const parent = path.dirname(path.resolve(dir));
  const base = path.basename(path.resolve(dir));
  const stamp = `${process.pid}.${Date.now()}`;
  const staging = path.join(parent, `.${base}.staging.${stamp}`);
  const retired = path.join(parent, `.${base}.retired.${stamp}`);

  try {
    await fs.mkdir(staging, { recursive: true });
    await populate(staging);
  } catch (e) {
    await discard(staging);
    if (e instanceof PersistenceError) throw e;
    throw new PersistenceError("Could not stage directory", staging, e);
  }

  let hadPrevious = true;
  try {
    await fs.rename(dir, retired);
  } catch (e) {
    if (!isNotFound(e)) {
      await discard(staging);
      throw new PersistenceError("Could not retire directory", dir, e);
    }
    hadPrevious = false;
  }

  try {
    await fs.rename(staging, dir);
  } catch (e) {
    if (hadPrevious) await fs.rename(retired, dir).catch(() => undefined);
    await discard(staging);
    throw new PersistenceError("Could not publish directory", dir, e);
  }

  if (hadPrevious) await discard(retired);
}
