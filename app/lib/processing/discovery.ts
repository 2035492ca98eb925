import { readdirSync, statSync, type Dirent } from "fs";
import { join } from "path";
import { lookup } from "mime-types";
import { ResourceNotFoundError } from "./errors";
import type { ConversionConfig, ConversionResources } from "../types";

/**
 * Whether an entry is a regular file or a directory, following symlinks.
 * A dangling link is neither.
 */
export function entryKind(dir: string, entry: Dirent): "file" | "directory" | null {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink()) return null;

  const target = statSync(join(dir, entry.name), { throwIfNoEntry: false });
  if (target?.isFile()) return "file";
  if (target?.isDirectory()) return "directory";
  return null;
}

/**
 * Regular, non-hidden files of a directory (symlinks followed) in
 * lexicographic order. Code-unit order, not locale order, so the result is
 * the same everywhere.
 */
function listFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => !entry.name.startsWith(".") && entryKind(dir, entry) === "file")
    .map((entry) => entry.name)
    .sort();
}

export function findSourceText(dir: string): { sourcePath: string; ignoredSources: string[] } {
  const candidates = listFiles(dir).filter((name) => name.endsWith(".txt"));
  const [first, ...rest] = candidates;
  if (first === undefined) {
    throw new ResourceNotFoundError("source", dir, `No .txt source file found in ${dir}`);
  }
  return {
    sourcePath: join(dir, first),
    ignoredSources: rest.map((name) => join(dir, name)),
  };
}

/**
 * Probe the extensions in preference order. An extension only counts when
 * exactly one file carries it; the first such extension wins.
 */
export function findCoverImage(dir: string, extensions: string[]): string {
  const files = listFiles(dir);

  for (const extension of extensions) {
    const found = files.filter((name) => name.endsWith(`.${extension}`));
    if (found.length === 1) {
      return join(dir, found[0]);
    }
  }

  throw new ResourceNotFoundError(
    "cover",
    dir,
    `No unambiguous cover image found in ${dir} (looked for exactly one .${extensions.join(", .")} file)`,
  );
}

/**
 * Image file names of a directory, sorted. Files whose extension does not
 * map to an image media type are left out.
 */
export function listImages(dir: string): string[] {
  return listFiles(dir).filter((name) => {
    const mimeType = lookup(name);
    return mimeType !== false && mimeType.startsWith("image/");
  });
}

export function discoverResources(workDir: string, config: ConversionConfig): ConversionResources {
  const { sourcePath, ignoredSources } = findSourceText(workDir);
  const coverPath = findCoverImage(workDir, config.coverExtensions);

  return {
    sourcePath,
    ignoredSources,
    coverPath,
    placeholderImages: listImages(join(workDir, config.placeholderDir)),
    frontImages: listImages(join(workDir, config.frontImageDir)),
  };
}
