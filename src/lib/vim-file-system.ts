import fs from "fs";
import path from "path";
import type { VimFileSystem } from "./vim-types";
import { splitTextLines } from "./vim-utils";

/**
 * File access backed by the local disk. Relative paths resolve against
 * `baseDir`, which defaults to the working directory.
 */
export function createNodeFileSystem(
  baseDir: string = process.cwd()
): VimFileSystem {
  const resolve = (file: string) => path.resolve(baseDir, file);

  return {
    exists(file) {
      return fs.existsSync(resolve(file));
    },
    readLines(file) {
      return splitTextLines(fs.readFileSync(resolve(file), "utf-8"));
    },
    writeLines(file, lines) {
      const target = resolve(file);
      const dir = path.dirname(target);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(target, lines.map((line) => `${line}\n`).join(""));
    },
  };
}
