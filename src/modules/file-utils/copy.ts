import {
  chmodSync,
  closeSync,
  copyFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readdirSync,
  statSync,
} from "fs";
import { join, normalize } from "path";

const PERMISSION_BITS = 0o7777;

/**
 * Copies a single file, flushes it to disk and gives the copy the source's
 * permission bits. Overwrites `dst` if it exists.
 */
export function copyFilePreservingMode(src: string, dst: string): void {
  copyFileSync(src, dst);

  const fd = openSync(dst, "r+");
  try {
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }

  chmodSync(dst, statSync(src).mode & PERMISSION_BITS);
}

/**
 * Recursively copies the directory tree at `src` to `dst`.
 *
 *   • `dst` must not exist yet
 *   • symbolic links anywhere in the tree are skipped, not followed
 *   • files and directories keep their permission bits
 *
 * Throws on the first failure; whatever was copied up to that point stays.
 */
export function copyDirectory(src: string, dst: string): void {
  src = normalize(src);
  dst = normalize(dst);

  const srcStat = statSync(src);
  if (!srcStat.isDirectory()) {
    throw new Error(`Source is not a directory: ${src}`);
  }
  if (existsSync(dst)) {
    throw new Error(`Destination already exists: ${dst}`);
  }

  mkdirSync(dst, { recursive: true });

  for (const entry of readdirSync(src, { withFileTypes: true })) {
    const srcPath = join(src, entry.name);
    const dstPath = join(dst, entry.name);

    if (entry.isSymbolicLink()) continue;

    if (entry.isDirectory()) {
      copyDirectory(srcPath, dstPath);
    } else if (entry.isFile()) {
      copyFilePreservingMode(srcPath, dstPath);
    }
  }

  // Applied last so a read-only source directory can still be filled
  chmodSync(dst, srcStat.mode & PERMISSION_BITS);
}
