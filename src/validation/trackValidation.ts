import { CELL_CHARS, MAX_CARS } from "../game/constants";

export type TrackFormatCode =
  | "empty-track"
  | "inconsistent-line-length"
  | "no-cars"
  | "too-many-cars"
  | "duplicate-car-id"
  | "invalid-move-format"
  | "invalid-waypoint-format";

export interface TrackFormatIssue {
  code: TrackFormatCode;
  message: string;
  line?: number;
}

export class TrackFormatError extends Error {
  public readonly code: TrackFormatCode;
  public readonly line: number | undefined;

  constructor(issue: TrackFormatIssue) {
    super(issue.message);
    this.name = "TrackFormatError";
    this.code = issue.code;
    this.line = issue.line;
  }
}

const BOARD_CHARS: ReadonlySet<string> = new Set(Object.values(CELL_CHARS));

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** One entry per board column; a marker may be any single code point. */
export function lineCells(line: string): string[] {
  return Array.from(line);
}

export function isCarMarker(char: string): boolean {
  return !BOARD_CHARS.has(char);
}

/** Leading blank lines are skipped; the block ends at the next blank line. */
export function extractTrackBlock(text: string): string[] {
  const lines = splitLines(text);
  let start = 0;
  while (start < lines.length && isBlankLine(lines[start] ?? "")) start += 1;
  const block: string[] = [];
  for (let i = start; i < lines.length; i += 1) {
    const line = lines[i] ?? "";
    if (isBlankLine(line)) break;
    block.push(line);
  }
  return block;
}

export function validateTrackLines(lines: readonly string[]): TrackFormatIssue[] {
  const first = lines[0];
  if (first === undefined) {
    return [{ code: "empty-track", message: "Track contains no grid lines" }];
  }

  const width = lineCells(first).length;
  const issues: TrackFormatIssue[] = [];
  const seen = new Set<string>();
  lines.forEach((line, row) => {
    const cells = lineCells(line);
    if (cells.length !== width) {
      issues.push({
        code: "inconsistent-line-length",
        message: `Line ${row + 1} has length ${cells.length}, expected ${width}`,
        line: row + 1
      });
    }
    for (const char of cells) {
      if (!isCarMarker(char)) continue;
      if (seen.has(char)) {
        issues.push({ code: "duplicate-car-id", message: `Duplicate car id '${char}'`, line: row + 1 });
        continue;
      }
      seen.add(char);
    }
  });

  if (seen.size === 0) {
    issues.push({ code: "no-cars", message: "Track contains no car start markers" });
  } else if (seen.size > MAX_CARS) {
    issues.push({
      code: "too-many-cars",
      message: `Track has ${seen.size} cars, at most ${MAX_CARS} are allowed`
    });
  }
  return issues;
}
