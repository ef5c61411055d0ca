import fs from "node:fs";
import path from "node:path";

/**
 * Copy the contents of `srcDir` into `dstDir`, creating it if needed.
 * Files already in `dstDir` are kept unless a copied path collides with them,
 * in which case the copy wins.
 */
export function copyDirContents(srcDir: string, dstDir: string): string[] {
  fs.mkdirSync(dstDir, { recursive: true });
  fs.cpSync(srcDir, dstDir, { recursive: true, force: true, errorOnExist: false });
  return listFiles(srcDir);
}

/** Relative paths of every regular file under `dir`, sorted. */
export function listFiles(dir: string): string[] {
  const out: string[] = [];
  collect(dir, "", out);
  return out.sort();
}

function collect(baseDir: string, rel: string, out: string[]): void {
  const entries = fs.readdirSync(path.join(baseDir, rel), { withFileTypes: true });
  for (const entry of entries) {
    const child = rel ? path.posix.join(rel, entry.name) : entry.name;
    if (entry.isDirectory()) collect(baseDir, child, out);
    else if (entry.isFile()) out.push(child);
  }
}
