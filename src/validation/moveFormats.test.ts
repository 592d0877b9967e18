import { describe, expect, it } from "vitest";
import { parseMoveList, parseWaypoints } from "./moveFormats";
import { TrackFormatError } from "./trackValidation";

function failureOf(run: () => unknown): TrackFormatError {
  try {
    run();
  } catch (error) {
    if (error instanceof TrackFormatError) return error;
    throw error;
  }
  throw new Error("expected a TrackFormatError");
}

describe("parseMoveList", () => {
  it("reads one acceleration name per line and skips blanks", () => {
    expect(parseMoveList("RIGHT\n\n  DOWN_LEFT \nNONE\n")).toEqual([
      { x: 1, y: 0 },
      { x: -1, y: 1 },
      { x: 0, y: 0 }
    ]);
  });

  it("accepts an empty list", () => {
    expect(parseMoveList("")).toEqual([]);
  });

  it("rejects unknown names with the line number", () => {
    const error = failureOf(() => parseMoveList("UP\nright"));
    expect(error.code).toBe("invalid-move-format");
    expect(error.line).toBe(2);
    expect(error.message).toBe(
      "Invalid move at line 2: 'right'. Must be one of UP_LEFT, UP, UP_RIGHT, LEFT, NONE, RIGHT, DOWN_LEFT, DOWN, DOWN_RIGHT"
    );
  });
});

describe("parseWaypoints", () => {
  it("reads one vector per line", () => {
    expect(parseWaypoints("(X:3, Y:1)\n\n(X:-2, Y:10)")).toEqual([
      { x: 3, y: 1 },
      { x: -2, y: 10 }
    ]);
  });

  it("rejects malformed lines", () => {
    const error = failureOf(() => parseWaypoints("(X:3, Y:1)\n3,1"));
    expect(error.code).toBe("invalid-waypoint-format");
    expect(error.message).toBe("Invalid waypoint at line 2: '3,1'");
  });

  it("rejects an empty list", () => {
    const error = failureOf(() => parseWaypoints("\n  \n"));
    expect(error.code).toBe("invalid-waypoint-format");
    expect(error.message).toBe("Waypoint list is empty");
    expect(error.line).toBeUndefined();
  });
});
