import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import JSZip from "jszip";

/**
 * Create a scratch directory populated with the given files. Keys are paths
 * relative to the directory; string values are written as UTF-8.
 */
export function createWorkDir(files: Record<string, string | Buffer>): string {
  const dir = mkdtempSync(join(tmpdir(), "txt2epub-"));
  writeFiles(dir, files);
  return dir;
}

export function writeFiles(dir: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(dir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

export function removeWorkDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function fakeImage(label: string): Buffer {
  return Buffer.from(`image-bytes:${label}`);
}

export async function readEntry(zip: JSZip, path: string): Promise<string> {
  const entry = zip.file(path);
  if (!entry) {
    throw new Error(`Missing entry ${path}`);
  }
  return entry.async("string");
}

export function spineOrder(opf: string): string[] {
  return [...opf.matchAll(/<itemref idref="([^"]+)"\/>/g)].map((m) => m[1]);
}
