import { closeSync, fstatSync, openSync, readSync } from "fs";

const NEWLINE = 0x0a;

/**
 * Returns the last line of a text file, read backwards one byte at a time
 * from the end so large logs are never loaded whole.
 *
 * A single trailing newline is ignored: "a\nb\n" → "b".
 * An empty file yields "".
 */
export function readLastLine(path: string): string {
  const fd = openSync(path, "r");
  try {
    const bytes: number[] = [];
    const buffer = Buffer.alloc(1);
    let pos = fstatSync(fd).size - 1;
    let firstByte = true;

    while (pos >= 0) {
      readSync(fd, buffer, 0, 1, pos);
      pos--;

      if (buffer[0] === NEWLINE) {
        if (firstByte) {
          firstByte = false;
          continue;
        }
        break;
      }

      firstByte = false;
      bytes.push(buffer[0]);
    }

    return Buffer.from(bytes.reverse()).toString("utf8");
  } finally {
    closeSync(fd);
  }
}
