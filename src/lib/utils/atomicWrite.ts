/**
 * Atomic file writes: temp file in the target directory → fsync → rename.
 * Readers see either the old file or the complete new one, never a partial write.
 */

import { closeSync, fsyncSync, mkdirSync, openSync, renameSync, rmSync, writeSync } from "fs";
import { randomBytes } from "crypto";
import { basename, dirname, join } from "path";

export function writeFileAtomic(targetPath: string, content: string): void {
  const dir = dirname(targetPath);
  mkdirSync(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(targetPath)}.${randomBytes(6).toString("hex")}.tmp`);
  let fd: number | null = openSync(tmpPath, "w");

  try {
    writeSync(fd, content, null, "utf-8");
    fsyncSync(fd);
    closeSync(fd);
    fd = null;
    renameSync(tmpPath, targetPath);
  } catch (error) {
    if (fd !== null) closeSync(fd);
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
