/**
 * Convert a plain-text novel directory into an EPUB.
 *
 *   txt2epub [directory]          convert one directory (default: cwd)
 *   txt2epub --all [directory]    convert each subdirectory and collect the EPUBs
 */

import { Command } from "commander";
import { resolve } from "path";
import { convertAll, convertTxtToEpub, loadConfig } from "../app/lib/processing";

const program = new Command();

function printProgress(_percent: number, message: string): void {
  console.log(message);
}

program
  .name("txt2epub")
  .description("Convert a plain-text novel with illustrations into an EPUB")
  .version("1.0.0")
  .argument("[directory]", "Working directory holding the .txt source and cover image", ".")
  .option("-a, --all", "Convert every subdirectory and copy the EPUBs into the directory")
  .option("-c, --config <file>", "Config file (default: <directory>/txt2epub.config.json)")
  .action(async (directory: string, options: { all?: boolean; config?: string }) => {
    const workDir = resolve(directory);
    const configPath = options.config ? resolve(options.config) : undefined;

    if (options.all) {
      const result = await convertAll(workDir, {
        configPath,
        onDirectory: (dir) => console.log(`Converting ${dir}`),
        onProgress: printProgress,
      });
      for (const { outputPath } of result.converted) {
        console.log(`Wrote ${outputPath}`);
      }
      for (const { directory: failed, error } of result.failed) {
        console.error(`Failed ${failed}: ${error.message}`);
      }
      if (result.failed.length > 0) {
        process.exitCode = 1;
      }
      return;
    }

    const config = await loadConfig(workDir, configPath);
    const result = await convertTxtToEpub(workDir, config, { onProgress: printProgress });
    console.log(`Wrote ${result.outputPath}`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
