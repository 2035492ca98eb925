export { convertTxtToEpub, assembleEpub, chapterPageId } from "./txt-to-epub";
export type { ConvertOptions, AssemblyInput, LoadedImage } from "./txt-to-epub";
export { convertAll } from "./batch";
export type { BatchOptions, BatchResult } from "./batch";
export { discoverResources, findSourceText, findCoverImage, listImages } from "./discovery";
export { substitutePlaceholders, findPlaceholders } from "./placeholders";
export { splitIntoChapters, renderChapterBody } from "./chapters";
export { EpubPackageBuilder } from "./package-builder";
export type { PackageBuilder, ImageAsset, CoverAsset, ContentPage, NavEntry, PackageMetadata } from "./package-builder";
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  loadConfigFile,
  resolveConfig,
} from "./config";
export type { ConfigOverrides } from "./config";
export { ResourceNotFoundError, ConfigError, PackageError } from "./errors";
