import { HEADING_LINE_REGEX, LINE_SPLIT_REGEX } from "./constants";
import type { Section } from "./types";

/**
 * Splits markdown at ATX heading lines. Each section keeps its heading line
 * as the first line of its text; text before the first heading becomes a
 * section with an empty heading. Blank sections are dropped.
 */
export function splitSections(markdown: string): Section[] {
  const groups: Array<{ heading: string; lines: string[] }> = [];
  let heading = "";
  let lines: string[] = [];

  for (const line of markdown.split(LINE_SPLIT_REGEX)) {
    const match = HEADING_LINE_REGEX.exec(line);
    if (match) {
      if (lines.length > 0) {
        groups.push({ heading, lines });
      }
      heading = (match[2] ?? "").trim();
      lines = [line];
    } else {
      lines.push(line);
    }
  }
  if (lines.length > 0) {
    groups.push({ heading, lines });
  }

  return groups
    .map((group) => ({
      heading: group.heading,
      text: group.lines.join("\n").trim(),
    }))
    .filter((section) => section.text.length > 0);
}
