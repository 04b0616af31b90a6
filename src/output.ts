import { type FileHandle, open } from "node:fs/promises";
import type { Passage } from "./types";
import { ensureParentDir } from "./utils";

export function serializePassage(passage: Passage): string {
  return `${JSON.stringify({
    id: passage.id,
    text: passage.text,
    metadata: passage.metadata,
  })}\n`;
}

/**
 * JSON Lines sink. The file is truncated on open and every record goes out
 * in its own write, so an interrupted run leaves only complete lines.
 */
export class PassageWriter {
  private written = 0;

  private constructor(
    readonly filePath: string,
    private handle: FileHandle | null
  ) {}

  static async open(filePath: string): Promise<PassageWriter> {
    await ensureParentDir(filePath);
    const handle = await open(filePath, "w");
    return new PassageWriter(filePath, handle);
  }

  get count(): number {
    return this.written;
  }

  async write(passage: Passage): Promise<void> {
    if (!this.handle) {
      throw new Error(`Passage writer for ${this.filePath} is closed`);
    }
    await this.handle.write(serializePassage(passage));
    this.written += 1;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
