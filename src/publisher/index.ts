// pattern: Imperative Shell
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Writes the feed next to its destination and renames it into place, so a
 * reader sees either the previous document or the new one.
 */
export async function publishFeed(outputPath: string, xml: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });

  const tempPath = `${outputPath}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, xml, "utf-8");
    await rename(tempPath, outputPath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Returns the published feed, or null when none has been written yet.
 */
export async function readFeed(outputPath: string): Promise<string | null> {
  try {
    return await readFile(outputPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return null;
    }
    throw err;
  }
}
