/**
 * Path Post-Processor
 *
 * Two separate reducers for raw tile-center paths:
 * - optimize_path: wall-aware, re-validates every shortcut against the map
 * - simplify_path: distance-only, for paths whose clearance is already trusted
 *
 * Both keep the first and last waypoint and return a new array.
 */

import type { Path, PixelPoint, WalkabilityMap } from "../types/grid.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";
import { is_doorway } from "./cost_model.js";
import { distance } from "./grid_geometry.js";

// Pixel distance from a point to the square covered by tile (tx, ty)
function distance_to_tile(point: PixelPoint, tx: number, ty: number, tile_size: number): number {
  const left = tx * tile_size;
  const top = ty * tile_size;
  const dx = Math.max(left - point.x, 0, point.x - (left + tile_size));
  const dy = Math.max(top - point.y, 0, point.y - (top + tile_size));
  return Math.hypot(dx, dy);
}

function sample_is_clear(
  map: WalkabilityMap,
  point: PixelPoint,
  wall_clearance: number
): boolean {
  const config = get_pathfinding_config();
  const tile_size = map.tile_size;
  const tx = Math.floor(point.x / tile_size);
  const ty = Math.floor(point.y / tile_size);
  if (!map.is_walkable(tx, ty)) return false;

  const clearance = is_doorway(map, tx, ty) ? config.doorway_clearance : wall_clearance;
  const min_px = clearance * tile_size * config.clearance_tile_fraction;

  for (let dx = -1; dx <= 1; dx++) {
    for (let dy = -1; dy <= 1; dy++) {
      if (dx === 0 && dy === 0) continue;
      if (map.is_walkable(tx + dx, ty + dy)) continue;
      if (distance_to_tile(point, tx + dx, ty + dy, tile_size) < min_px) return false;
    }
  }
  return true;
}

/**
 * Whether an agent can walk the straight segment a -> b keeping its clearance.
 * Sampled every half tile, endpoints included.
 */
export function segment_is_clear(
  map: WalkabilityMap,
  a: PixelPoint,
  b: PixelPoint,
  wall_clearance: number = get_pathfinding_config().default_wall_clearance
): boolean {
  const step = map.tile_size / 2;
  const samples = Math.max(1, Math.ceil(distance(a, b) / step));

  for (let s = 0; s <= samples; s++) {
    const t = s / samples;
    const point = { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
    if (!sample_is_clear(map, point, wall_clearance)) return false;
  }
  return true;
}

/**
 * Greedy furthest-visible reduction. From each anchor the furthest later
 * waypoint with a clear segment is kept; the next waypoint is kept when none
 * is. O(n^2) segment checks in the worst case.
 */
export function optimize_path(
  map: WalkabilityMap,
  path: readonly PixelPoint[],
  wall_clearance: number = get_pathfinding_config().default_wall_clearance
): Path {
  const n = path.length;
  const first = path[0];
  if (n <= 2 || !first) return path.slice();

  const optimized: Path = [first];
  let anchor = 0;

  while (anchor < n - 1) {
    let next = anchor + 1;
    const from = path[anchor];
    if (from) {
      for (let j = n - 1; j > anchor + 1; j--) {
        const to = path[j];
        if (to && segment_is_clear(map, from, to, wall_clearance)) {
          next = j;
          break;
        }
      }
    }
    const kept = path[next];
    if (kept) optimized.push(kept);
    anchor = next;
  }

  return optimized;
}

/**
 * Distance-threshold furthest-point reduction, no map queries.
 *
 * From the anchor, a later point replaces the current pick when it lies more
 * than `tolerance` pixels further from the anchor than the pick does.
 */
export function simplify_path(path: readonly PixelPoint[], tolerance = 1.0): Path {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new RangeError(`tolerance must be a non-negative number, got ${tolerance}`);
  }

  const n = path.length;
  const first = path[0];
  if (n <= 2 || !first) return path.slice();

  const simplified: Path = [first];
  let anchor = 0;

  while (anchor < n - 1) {
    const origin = path[anchor];
    let furthest = anchor + 1;

    for (let i = anchor + 2; i < n; i++) {
      const candidate = path[i];
      const current = path[furthest];
      if (!origin || !candidate || !current) continue;
      if (distance(origin, candidate) > distance(origin, current) + tolerance) {
        furthest = i;
      }
    }

    const kept = path[furthest];
    if (kept) simplified.push(kept);
    anchor = furthest;
  }

  return simplified;
}
