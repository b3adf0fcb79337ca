/**
 * Local storage for decrypted segment files
 */

import { mkdir, mkdtemp, open, readdir, rm, type FileHandle } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { IOError, SEGMENT_FILE_EXTENSION } from "@tsgrab/streaming";

/** Creates segment files; the returned handle stays open for the caller */
export interface SegmentStorage {
  write(path: string, data: Uint8Array): Promise<FileHandle>;
}

export class LocalSegmentStorage implements SegmentStorage {
  async write(path: string, data: Uint8Array): Promise<FileHandle> {
    let handle: FileHandle | undefined;
    try {
      handle = await open(path, "w+");
      await handle.writeFile(data);
      return handle;
    } catch (error) {
      if (handle) {
        await handle.close().catch(() => {});
        // A truncated segment must not pass for a finished one
        await rm(path, { force: true }).catch(() => {});
      }
      throw new IOError(path, error);
    }
  }
}

/** Where segment `index` lands inside `outputDir` */
export function segmentFilePath(outputDir: string, index: number): string {
  return join(outputDir, `${index}${SEGMENT_FILE_EXTENSION}`);
}

export async function prepareOutputDir(dir: string): Promise<string> {
  try {
    await mkdir(dir, { recursive: true });
    return dir;
  } catch (error) {
    throw new IOError(dir, error);
  }
}

/** Fresh `tsgrab-*` directory under the OS temp dir */
export async function createTempOutputDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "tsgrab-"));
}

export async function removeOutputDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Segment files in `dir`, ordered by index, ready to be concatenated
 */
export async function listSegmentFiles(dir: string): Promise<string[]> {
  const pattern = new RegExp(`^(\\d+)${SEGMENT_FILE_EXTENSION.replace(".", "\\.")}$`);
  const entries = await readdir(dir);

  return entries
    .map((name) => ({ name, match: pattern.exec(name) }))
    .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => join(dir, entry.name));
}
