import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

const TRACK_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const TRACK_EXTENSION = ".txt";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Grid files in one directory, addressed by file name without `.txt`. */
export class TrackLibrary {
  constructor(private readonly dir: string) {}

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return entries
      .filter((name) => name.endsWith(TRACK_EXTENSION))
      .map((name) => name.slice(0, -TRACK_EXTENSION.length))
      .filter((trackId) => TRACK_ID_PATTERN.test(trackId))
      .sort();
  }

  async load(trackId: string): Promise<string | null> {
    if (!TRACK_ID_PATTERN.test(trackId)) return null;
    try {
      return await readFile(path.join(this.dir, `${trackId}${TRACK_EXTENSION}`), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }
}
