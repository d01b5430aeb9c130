import * as fs from "fs";
import * as path from "path";

export function isDirectory(p: string): boolean {
  try {
    const stats = fs.statSync(p);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

// Normalizes a path to its canonical form
// (e.g., resolves .. and . segments, uses consistent separators)
export function canonicalizePath(p: string): string {
  return path.normalize(p);
}

// Resolves relativePath against the directory containing basePath.
export function resolvePath(basePath: string, relativePath: string): string {
  return path.resolve(path.dirname(basePath), relativePath);
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function readTextFileSync(filePath: string, encoding?: BufferEncoding): string {
  return fs.readFileSync(filePath, encoding || "utf-8");
}

export async function writeTextFile(filePath: string, content: string, encoding?: BufferEncoding): Promise<void> {
  ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, { encoding: encoding || "utf-8" });
}
