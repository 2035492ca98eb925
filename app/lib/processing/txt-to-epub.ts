import { readFile } from "fs/promises";
import { basename, extname, join } from "path";
import { lookup } from "mime-types";
import { renderChapterBody, splitIntoChapters } from "./chapters";
import { resolveConfig } from "./config";
import { discoverResources } from "./discovery";
import { EpubPackageBuilder, type NavEntry, type PackageBuilder } from "./package-builder";
import { substitutePlaceholders } from "./placeholders";
import { assetHref, escapeHtml, FRONT_IMAGE_DIR, imageReference, PLACEHOLDER_IMAGE_DIR } from "./utils";
import type { Chapter, ConversionConfig, ConversionResult } from "../types";

export interface ConvertOptions {
  onProgress?: (percent: number, message: string) => void;
  /** Defaults to an EPUB builder */
  builder?: PackageBuilder;
}

export interface LoadedImage {
  fileName: string;
  data: Buffer;
}

export interface AssemblyInput {
  title: string;
  language: string;
  author?: string;
  chapters: Chapter[];
  placeholderImages: LoadedImage[];
  /** Placeholder images that substitution placed in the text */
  illustrations: string[];
  frontImages: LoadedImage[];
  cover: LoadedImage;
}

function mediaTypeOf(fileName: string): string {
  return lookup(fileName) || "application/octet-stream";
}

export function chapterPageId(position: number): string {
  return `chap_${String(position).padStart(2, "0")}`;
}

/**
 * Wire chapters and images into a package.
 *
 * Chapter pages (preface first) form the reading order and the navigation.
 * Front-matter pages are then inserted ahead of them one by one at a growing
 * offset, so they end up first and in ascending order.
 */
export function assembleEpub(input: AssemblyInput, builder: PackageBuilder): void {
  builder.setMetadata({ title: input.title, language: input.language, author: input.author });

  input.placeholderImages.forEach((img, i) => {
    builder.addImage({
      id: `image-${i + 1}`,
      href: assetHref(PLACEHOLDER_IMAGE_DIR, img.fileName),
      mediaType: mediaTypeOf(img.fileName),
      data: img.data,
    });
  });

  const readingOrder: string[] = [];
  const navigation: NavEntry[] = [];
  const illustrations = new Set(input.illustrations.map(imageReference));

  input.chapters.forEach((chapter, i) => {
    const position = i + 1;
    const id = chapterPageId(position);
    builder.addPage({
      id,
      href: `${id}.xhtml`,
      title: chapter.title,
      markup: `<h1>${escapeHtml(chapter.title)}</h1>\n<p>${renderChapterBody(chapter.body, illustrations)}</p>`,
    });
    readingOrder.push(id);
    navigation.push({ uid: `chap${position}`, pageId: id, title: chapter.title });
  });

  input.frontImages.forEach((img, i) => {
    const position = i + 1;
    const href = assetHref(FRONT_IMAGE_DIR, img.fileName);
    const id = `front_img_${position}`;

    builder.addImage({
      id: `front-image-${position}`,
      href,
      mediaType: mediaTypeOf(img.fileName),
      data: img.data,
    });
    builder.addPage({
      id,
      href: `${id}.xhtml`,
      title: `Front Image ${position}`,
      markup: `<img src="${href}" alt="Front Image ${position}" style="max-width: 100%; height: auto;"/>`,
    });
    readingOrder.splice(position - 1, 0, id);
  });

  builder.setCover({
    href: encodeURIComponent(input.cover.fileName),
    mediaType: mediaTypeOf(input.cover.fileName),
    data: input.cover.data,
  });
  builder.setReadingOrder(readingOrder);
  builder.setNavigation(navigation);
}

async function loadImages(dir: string, fileNames: string[]): Promise<LoadedImage[]> {
  const images: LoadedImage[] = [];
  for (const fileName of fileNames) {
    images.push({ fileName, data: await readFile(join(dir, fileName)) });
  }
  return images;
}

/**
 * Convert the novel in a working directory to <source-basename>.epub,
 * written to the same directory. Everything is assembled in memory first,
 * so a failing run leaves no output behind.
 */
export async function convertTxtToEpub(
  workDir: string,
  config: ConversionConfig = resolveConfig(),
  options?: ConvertOptions,
): Promise<ConversionResult> {
  const progress = options?.onProgress ?? (() => {});

  progress(2, "Discovering resources...");
  const resources = discoverResources(workDir, config);
  if (resources.ignoredSources.length > 0) {
    progress(
      4,
      `Multiple .txt files found; using ${basename(resources.sourcePath)}, ignoring ${resources.ignoredSources
        .map((p) => basename(p))
        .join(", ")}`,
    );
  }

  // Patterns are written against \n line endings
  const text = (await readFile(resources.sourcePath, "utf-8")).replace(/\r\n?/g, "\n");

  progress(10, "Replacing placeholders...");
  const substituted = substitutePlaceholders(text, resources.placeholderImages, config.placeholderPattern);
  for (const { image } of substituted.substitutions) {
    progress(10, `Replacing placeholder with: ${image}`);
  }
  if (substituted.remainingMarkers > 0) {
    progress(10, `${substituted.remainingMarkers} placeholder(s) left without an image`);
  }

  progress(30, "Detecting chapters...");
  const chapters = splitIntoChapters(substituted.text, config.chapterPattern, config.prefaceTitle);
  for (const chapter of chapters.slice(1)) {
    progress(30, `Chapter found: ${chapter.title}`);
  }

  progress(50, "Loading images...");
  const placeholderImages = await loadImages(join(workDir, config.placeholderDir), resources.placeholderImages);
  const frontImages = await loadImages(join(workDir, config.frontImageDir), resources.frontImages);
  const cover: LoadedImage = {
    fileName: basename(resources.coverPath),
    data: await readFile(resources.coverPath),
  };

  progress(70, "Generating EPUB...");
  const title = basename(resources.sourcePath, extname(resources.sourcePath));
  const builder = options?.builder ?? new EpubPackageBuilder();
  assembleEpub(
    {
      title,
      language: config.language,
      author: config.author,
      chapters,
      placeholderImages,
      illustrations: substituted.substitutions.map((s) => s.image),
      frontImages,
      cover,
    },
    builder,
  );

  const outputPath = join(workDir, `${title}.epub`);
  await builder.writeTo(outputPath);

  progress(100, "Conversion complete");

  return {
    outputPath,
    chapters: chapters.map((c) => c.title),
    substitutions: substituted.substitutions.length,
    remainingMarkers: substituted.remainingMarkers,
  };
}
