import type { Vec2 } from "../types/track";

const VEC_TEXT_PATTERN = /^\(\s*[Xx]\s*:\s*([+-]?\d+)\s*,\s*[Yy]\s*:\s*([+-]?\d+)\s*\)$/;

export const ZERO_VEC: Vec2 = vec(0, 0);

export function vec(x: number, y: number): Vec2 {
  // `+ 0` folds -0 into 0 so that equal vectors also format and key the same.
  return Object.freeze({ x: x + 0, y: y + 0 });
}

export function addVec(a: Vec2, b: Vec2): Vec2 {
  return vec(a.x + b.x, a.y + b.y);
}

export function subVec(a: Vec2, b: Vec2): Vec2 {
  return vec(a.x - b.x, a.y - b.y);
}

export function absVec(v: Vec2): Vec2 {
  return vec(Math.abs(v.x), Math.abs(v.y));
}

export function signVec(v: Vec2): Vec2 {
  return vec(Math.sign(v.x), Math.sign(v.y));
}

export function dotVec(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function vecEquals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

function zigzag(n: number): number {
  return n >= 0 ? n * 2 : -n * 2 - 1;
}

/**
 * Collision-free integer key for a vector (zigzag + Szudzik pairing).
 * Exact for components within ±4.7e7, far beyond any board or velocity.
 */
export function vecKey(v: Vec2): number {
  const a = zigzag(v.x);
  const b = zigzag(v.y);
  return a >= b ? a * a + a + b : b * b + a;
}

export function formatVec(v: Vec2): string {
  return `(X:${v.x}, Y:${v.y})`;
}

export function parseVec(text: string): Vec2 | null {
  const match = VEC_TEXT_PATTERN.exec(text.trim());
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  return vec(Number.parseInt(match[1], 10), Number.parseInt(match[2], 10));
}
