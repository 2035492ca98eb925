import { compilePattern } from "./config";
import { escapeHtml, IMAGE_REFERENCE_PATTERN } from "./utils";
import type { Chapter } from "../types";

/**
 * Split text into a preface and one chapter per title match.
 *
 * The preface is everything before the first match (the whole text when
 * nothing matches) and is always present. A chapter body runs from the end
 * of its title match to the start of the next one, or to the end of the
 * text. Titles come from the first capture group, or from the whole match
 * when the pattern has none.
 */
export function splitIntoChapters(text: string, pattern: RegExp, prefaceTitle = "Preface"): Chapter[] {
  const matches = [...text.matchAll(compilePattern(pattern, "chapterPattern"))];

  const prefaceEnd = matches.length > 0 ? (matches[0].index ?? 0) : text.length;
  const chapters: Chapter[] = [
    { index: 0, title: prefaceTitle, body: text.slice(0, prefaceEnd).trim() },
  ];

  matches.forEach((match, i) => {
    const end = (match.index ?? 0) + match[0].length;
    const next = matches[i + 1];
    const nextStart = next ? (next.index ?? text.length) : text.length;

    chapters.push({
      index: i + 1,
      title: (match[1] ?? match[0]).trim(),
      body: text.slice(end, nextStart).trim(),
    });
  });

  return chapters;
}

/**
 * Render a chapter body as paragraph content: text is escaped and every
 * newline becomes <br/>. An illustration reference stays markup only when it
 * is one of the references substitution actually inserted; anything else
 * shaped like one is source text and is escaped with the rest.
 */
export function renderChapterBody(body: string, illustrations: ReadonlySet<string> = new Set()): string {
  let html = "";
  let last = 0;

  for (const match of body.matchAll(IMAGE_REFERENCE_PATTERN)) {
    if (!illustrations.has(match[0])) continue;
    const start = match.index ?? 0;
    html += escapeHtml(body.slice(last, start)) + match[0];
    last = start + match[0].length;
  }
  html += escapeHtml(body.slice(last));

  return html.replace(/\n/g, "<br/>");
}
