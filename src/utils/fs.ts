import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, resolve, relative } from "node:path";

/**
 * Validates that an output directory is within the current working directory.
 * Prevents writing reports to arbitrary system locations.
 */
export function validateOutputDirectory(outDir: string): void {
  const cwd = process.cwd();
  const resolvedOut = resolve(outDir);
  const relativePath = relative(cwd, resolvedOut);

  if (relativePath.startsWith("..")) {
    throw new Error(`Output directory must be within the working directory: ${outDir}`);
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creation time of a file. Falls back to the inode change time on
 * filesystems that do not record a birth time (reported as epoch 0).
 */
export async function fileCreatedAt(path: string): Promise<Date> {
  const info = await stat(path);
  return info.birthtimeMs > 0 ? info.birthtime : info.ctime;
}

export async function readText(path: string): Promise<string> {
  return readFile(path, "utf8");
}

export async function writeJson(path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(path));
  const content = JSON.stringify(data, null, 2);
  await writeFile(path, content, "utf8");
}

export async function writeText(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, content, "utf8");
}

/** Lowercase, dash-separated file-name fragment. */
export function toSlug(value: string, fallback = "item"): string {
  const normalized = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return normalized.length > 0 ? normalized : fallback;
}
