/**
 * Grid Cost Model
 *
 * Turns the binary walkable predicate into a traversal surcharge that steers
 * the search off walls. Doorways stay cheap even though they touch walls.
 */

import type { WalkabilityMap } from "../types/grid.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";

/**
 * A walkable tile flanked by blocked tiles on both sides of exactly one axis.
 * Always computed live from the map.
 */
export function is_doorway(map: WalkabilityMap, x: number, y: number): boolean {
  if (!map.is_walkable(x, y)) return false;

  const east_west_blocked = !map.is_walkable(x + 1, y) && !map.is_walkable(x - 1, y);
  const north_south_blocked = !map.is_walkable(x, y - 1) && !map.is_walkable(x, y + 1);
  return east_west_blocked !== north_south_blocked;
}

/**
 * Sum of wall proximity around a tile.
 *
 * Blocked tiles in the (2r+1)^2 square add 1 / euclidean distance, except the
 * four orthogonal neighbors which add a flat orthogonal_wall_penalty
 * (doorway_wall_penalty when the tile itself is a doorway).
 */
export function wall_penalty(
  map: WalkabilityMap,
  x: number,
  y: number,
  radius: number = get_pathfinding_config().wall_penalty_radius
): number {
  const config = get_pathfinding_config();
  const orthogonal_cost = is_doorway(map, x, y)
    ? config.doorway_wall_penalty
    : config.orthogonal_wall_penalty;

  let penalty = 0;
  for (let dx = -radius; dx <= radius; dx++) {
    for (let dy = -radius; dy <= radius; dy++) {
      if (dx === 0 && dy === 0) continue;
      if (map.is_walkable(x + dx, y + dy)) continue;

      if (Math.abs(dx) + Math.abs(dy) === 1) {
        penalty += orthogonal_cost;
      } else {
        penalty += 1 / Math.hypot(dx, dy);
      }
    }
  }
  return penalty;
}

/**
 * Multiplier applied to wall penalty on an edge: doorways relax it
 */
export function effective_clearance(
  from_is_doorway: boolean,
  to_is_doorway: boolean,
  wall_clearance: number
): number {
  if (from_is_doorway || to_is_doorway) {
    return get_pathfinding_config().doorway_clearance;
  }
  return wall_clearance;
}
