import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { ConversionConfig } from "../types";

export const CONFIG_FILE_NAME = "txt2epub.config.json";

// A line holding only 插圖, optionally in full-width parentheses. The
// surrounding newlines are not consumed so adjacent marker lines both match.
export const DEFAULT_PLACEHOLDER_PATTERN = /(?<=\n)（?插圖）?(?=\n)/g;

// A title line containing 章 or 話 followed by an ideographic space,
// flanked by blank lines.
export const DEFAULT_CHAPTER_PATTERN = /\n\n(.*?[章話]　.*?)\n\n/g;

export const DEFAULT_CONFIG: ConversionConfig = {
  placeholderDir: "images",
  frontImageDir: "front_images",
  placeholderPattern: DEFAULT_PLACEHOLDER_PATTERN,
  chapterPattern: DEFAULT_CHAPTER_PATTERN,
  coverExtensions: ["jpg", "png", "jpeg"],
  prefaceTitle: "Preface",
  language: "zh",
};

export type ConfigOverrides = Partial<
  Omit<ConversionConfig, "placeholderPattern" | "chapterPattern">
> & {
  placeholderPattern?: RegExp | string;
  chapterPattern?: RegExp | string;
};

const configFileSchema = z
  .object({
    placeholderDir: z.string().min(1).optional(),
    frontImageDir: z.string().min(1).optional(),
    placeholderPattern: z.string().min(1).optional(),
    chapterPattern: z.string().min(1).optional(),
    coverExtensions: z
      .array(z.string().regex(/^[A-Za-z0-9]+$/, "expected a bare extension such as jpg"))
      .min(1)
      .optional(),
    prefaceTitle: z.string().optional(),
    language: z.string().min(1).optional(),
    author: z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Compile a pattern for matchAll: strings become regular expressions and
 * the global flag is always set.
 */
export function compilePattern(pattern: RegExp | string, name: string): RegExp {
  if (typeof pattern !== "string") {
    return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  }
  try {
    return new RegExp(pattern, "g");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid ${name}: ${reason}`);
  }
}

export function resolveConfig(overrides: ConfigOverrides = {}): ConversionConfig {
  const config: ConversionConfig = {
    placeholderDir: overrides.placeholderDir ?? DEFAULT_CONFIG.placeholderDir,
    frontImageDir: overrides.frontImageDir ?? DEFAULT_CONFIG.frontImageDir,
    placeholderPattern: compilePattern(
      overrides.placeholderPattern ?? DEFAULT_CONFIG.placeholderPattern,
      "placeholderPattern",
    ),
    chapterPattern: compilePattern(
      overrides.chapterPattern ?? DEFAULT_CONFIG.chapterPattern,
      "chapterPattern",
    ),
    coverExtensions: overrides.coverExtensions ?? DEFAULT_CONFIG.coverExtensions,
    prefaceTitle: overrides.prefaceTitle ?? DEFAULT_CONFIG.prefaceTitle,
    language: overrides.language ?? DEFAULT_CONFIG.language,
  };
  if (overrides.author !== undefined) {
    config.author = overrides.author;
  }
  return config;
}

/**
 * Read and validate a config file. A missing file is not an error and
 * yields no overrides.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  if (!existsSync(filePath)) {
    return {};
  }

  const raw = await readFile(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${filePath} is not valid JSON: ${reason}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`${filePath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load the configuration for a working directory: the file given
 * explicitly, or txt2epub.config.json inside the directory.
 */
export async function loadConfig(workDir: string, configPath?: string): Promise<ConversionConfig> {
  if (configPath !== undefined && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const overrides = await loadConfigFile(configPath ?? join(workDir, CONFIG_FILE_NAME));
  return resolveConfig(overrides);
}
