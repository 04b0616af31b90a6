import { createHash } from "node:crypto";
import {
  CHARS_PER_TOKEN,
  PASSAGE_ID_LENGTH,
  SECTION_PATH_SEPARATOR,
} from "./constants";
import type { Passage, Section } from "./types";
import { codePointLength } from "./utils";

export interface ChunkOptions {
  url: string;
  title: string;
  source: string;
  minTokens: number;
  maxTokens: number;
}

/** Rough size estimate, four characters per token, never below one. */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor(codePointLength(text) / CHARS_PER_TOKEN));
}

export function passageId(url: string, text: string): string {
  return createHash("sha1")
    .update(`${url}\n${text}`, "utf8")
    .digest("hex")
    .slice(0, PASSAGE_ID_LENGTH);
}

function sectionPath(title: string, heading: string): string[] {
  return [title, heading].filter((part) => part.length > 0);
}

/**
 * Greedily packs whole sections into passages. A buffer is flushed as soon
 * as it reaches `minTokens`, or before a section that would push it past
 * `maxTokens`. Sections are never split, so one oversized section becomes
 * one oversized passage.
 */
export function chunkSections(
  sections: Section[],
  options: ChunkOptions
): Passage[] {
  const passages: Passage[] = [];
  let buffer = "";
  let bufferPath: string[] = [];

  const flush = (): void => {
    const text = buffer.trim();
    if (text) {
      passages.push({
        id: passageId(options.url, text),
        text,
        metadata: {
          source: options.source,
          url: options.url,
          title: options.title,
          section_path: bufferPath.join(SECTION_PATH_SEPARATOR),
        },
      });
    }
    buffer = "";
    bufferPath = [];
  };

  for (const section of sections) {
    const path = sectionPath(options.title, section.heading);

    if (!buffer) {
      buffer = section.text;
      bufferPath = path;
      continue;
    }

    if (
      estimateTokens(buffer) + estimateTokens(section.text) >
      options.maxTokens
    ) {
      flush();
      buffer = section.text;
      bufferPath = path;
    } else {
      buffer = `${buffer}\n\n${section.text}`.trim();
      if (bufferPath.length === 0) {
        bufferPath = path;
      }
    }

    if (estimateTokens(buffer) >= options.minTokens) {
      flush();
    }
  }

  if (buffer) {
    flush();
  }

  return passages;
}
