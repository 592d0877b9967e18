import type { Vec2 } from "../types/track";
import { vec } from "./vectorMath";

/**
 * Grid cells a straight move from `start` to `end` passes through, both ends
 * included, `max(|dx|, |dy|) + 1` cells long.
 *
 * Integer error accumulation in doubled units. The fast axis steps every
 * iteration; the slow axis steps whenever the error goes negative. When the
 * ideal line passes exactly halfway between two cells the lower-coordinate
 * cell wins, which is what makes `rasterizeLine(b, a)` the reverse of
 * `rasterizeLine(a, b)`: a slow axis running toward negative coordinates
 * starts with the error one lower, so it rounds ties up in magnitude.
 */
export function rasterizeLine(start: Vec2, end: Vec2): Vec2[] {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const distX = Math.abs(dx);
  const distY = Math.abs(dy);
  const dirX = Math.sign(dx);
  const dirY = Math.sign(dy);

  const xIsFast = distX > distY;
  const fast = xIsFast ? distX : distY;
  const slow = xIsFast ? distY : distX;
  const slowDir = xIsFast ? dirY : dirX;
  const straightX = xIsFast ? dirX : 0;
  const straightY = xIsFast ? 0 : dirY;

  const cells: Vec2[] = [vec(start.x, start.y)];
  let x = start.x;
  let y = start.y;
  let error = slowDir < 0 ? fast - 1 : fast;
  for (let step = 0; step < fast; step += 1) {
    error -= 2 * slow;
    if (error < 0) {
      error += 2 * fast;
      x += dirX;
      y += dirY;
    } else {
      x += straightX;
      y += straightY;
    }
    cells.push(vec(x, y));
  }
  return cells;
}
