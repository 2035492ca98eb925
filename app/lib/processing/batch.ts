import { readdirSync } from "fs";
import { copyFile } from "fs/promises";
import { basename, join } from "path";
import { loadConfig } from "./config";
import { entryKind } from "./discovery";
import { convertTxtToEpub, type ConvertOptions } from "./txt-to-epub";

export interface BatchResult {
  converted: { directory: string; outputPath: string }[];
  failed: { directory: string; error: Error }[];
}

export interface BatchOptions {
  /** Applies to every directory instead of each one's own config file */
  configPath?: string;
  onDirectory?: (directory: string) => void;
  onProgress?: ConvertOptions["onProgress"];
}

/**
 * Convert every immediate subdirectory of rootDir on its own and copy each
 * resulting EPUB into rootDir. A failing directory does not stop the rest.
 */
export async function convertAll(rootDir: string, options: BatchOptions = {}): Promise<BatchResult> {
  const directories = readdirSync(rootDir, { withFileTypes: true })
    .filter((entry) => !entry.name.startsWith(".") && entryKind(rootDir, entry) === "directory")
    .map((entry) => join(rootDir, entry.name))
    .sort();

  const result: BatchResult = { converted: [], failed: [] };

  for (const directory of directories) {
    options.onDirectory?.(directory);
    try {
      const config = await loadConfig(directory, options.configPath);
      const { outputPath } = await convertTxtToEpub(directory, config, {
        onProgress: options.onProgress,
      });
      const copied = join(rootDir, basename(outputPath));
      await copyFile(outputPath, copied);
      result.converted.push({ directory, outputPath: copied });
    } catch (error) {
      result.failed.push({
        directory,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  return result;
}
