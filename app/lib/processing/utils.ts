/**
 * Markup helpers shared by the conversion stages
 */

export const PLACEHOLDER_IMAGE_DIR = "images";
export const FRONT_IMAGE_DIR = "front_images";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Path of an embedded image relative to the package content directory.
 * File names are percent-encoded so they are safe inside an href.
 */
export function assetHref(namespace: string, fileName: string): string {
  return `${namespace}/${encodeURIComponent(fileName)}`;
}

/**
 * The inline reference a placeholder marker is replaced with.
 */
export function imageReference(fileName: string): string {
  return `<img src="${assetHref(PLACEHOLDER_IMAGE_DIR, fileName)}" alt="${escapeHtml(fileName)}"/>`;
}

// Matches exactly what imageReference produces.
export const IMAGE_REFERENCE_PATTERN = new RegExp(
  `<img src="${PLACEHOLDER_IMAGE_DIR}/[^"<>&]*" alt="[^"<>]*"/>`,
  "g",
);
