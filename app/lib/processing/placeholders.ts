import { compilePattern } from "./config";
import { imageReference } from "./utils";
import type { SubstitutionResult } from "../types";

export interface PlaceholderMatch {
  start: number;
  end: number;
  marker: string;
}

/**
 * Every placeholder marker in document order.
 *
 * When the pattern has a first capture group, only the group is the marker:
 * the text around it (typically the delimiting newlines) stays in place and
 * the scan resumes at the end of the group, so a delimiter shared by two
 * adjacent marker lines serves both.
 */
export function findPlaceholders(text: string, pattern: RegExp): PlaceholderMatch[] {
  const compiled = compilePattern(pattern, "placeholderPattern");
  const scanner = new RegExp(
    compiled.source,
    compiled.flags.includes("d") ? compiled.flags : `${compiled.flags}d`,
  );

  const matches: PlaceholderMatch[] = [];
  let match: RegExpExecArray | null;
  while ((match = scanner.exec(text)) !== null) {
    const group = match.indices?.[1];
    const [start, end] = group ?? [match.index, match.index + match[0].length];
    matches.push({ start, end, marker: text.slice(start, end) });

    // An empty marker would otherwise be found again at the same offset
    scanner.lastIndex = end > match.index ? end : match.index + 1;
  }
  return matches;
}

/**
 * Replace placeholder markers with illustration references.
 *
 * Markers are paired with images in document order and filename order, so
 * min(markers, images) replacements happen. Replacements are applied from
 * the end of the text backwards, which keeps the earlier offsets valid.
 * Markers without an image are left in the text as they are.
 */
export function substitutePlaceholders(
  text: string,
  images: string[],
  pattern: RegExp,
): SubstitutionResult {
  const markers = findPlaceholders(text, pattern);
  const count = Math.min(markers.length, images.length);

  let result = text;
  for (let i = count - 1; i >= 0; i--) {
    const { start, end } = markers[i];
    result = result.slice(0, start) + imageReference(images[i]) + result.slice(end);
  }

  return {
    text: result,
    substitutions: markers.slice(0, count).map((m, i) => ({ marker: m.marker, image: images[i] })),
    remainingMarkers: markers.length - count,
  };
}
