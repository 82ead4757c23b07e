/**
 * Stuck Detector & Escape Router
 *
 * Recognizes tiles that make the search degenerate (dense walls, corner
 * pockets) and hands back a short two-waypoint hop to a better tile instead
 * of a full search.
 */

import type { Path, TilePosition, WalkabilityMap } from "../types/grid.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";
import { debug_verbose } from "../shared/debug.js";
import { count_blocked_neighbors, NEIGHBOR_OFFSETS, tile_center } from "./grid_geometry.js";

const ESCAPE_WALL_WEIGHT = 0.5;
const ESCAPE_OPEN_WEIGHT = 0.3;

const CORNER_SIGNS: ReadonlyArray<readonly [number, number]> = [
  [1, 1], [1, -1], [-1, 1], [-1, -1],
];

type EscapeCandidate = {
  tile: TilePosition;
  ring: number;
  score: number;
};

/**
 * True when enough neighbors are blocked, or when the tile sits in a corner
 * (one horizontal and one vertical neighbor both blocked). The corner case
 * catches pockets with fewer blocked neighbors than the threshold.
 */
export function is_stuck(
  map: WalkabilityMap,
  x: number,
  y: number,
  stuck_threshold: number = get_pathfinding_config().stuck_threshold
): boolean {
  if (count_blocked_neighbors(map, x, y) >= stuck_threshold) return true;

  for (const [sx, sy] of CORNER_SIGNS) {
    if (!map.is_walkable(x + sx, y) && !map.is_walkable(x, y + sy)) {
      return true;
    }
  }
  return false;
}

// Tiles at manhattan distance `radius`, x offset ascending
function ring_offsets(radius: number): Array<[number, number]> {
  const offsets: Array<[number, number]> = [];
  for (let dx = -radius; dx <= radius; dx++) {
    const rest = radius - Math.abs(dx);
    if (rest === 0) {
      offsets.push([dx, 0]);
    } else {
      offsets.push([dx, -rest], [dx, rest]);
    }
  }
  return offsets;
}

function escape_result(map: WalkabilityMap, from: TilePosition, to: TilePosition): Path {
  return [tile_center(from, map.tile_size), tile_center(to, map.tile_size)];
}

/**
 * Search outward from a stuck tile for the nearest tile that is not stuck.
 *
 * Rings |dx|+|dy| = 1..max_distance are scanned; each walkable, non-stuck
 * tile is scored `ring + 0.5 * walls - 0.3 * open` (lower is better). The
 * nearest open space (enough walkable neighbors) beats the best score; the
 * last resort is a single hop to any usable neighbor.
 *
 * @returns [center of (x, y), center of the chosen tile], or null
 */
export function find_escape_path(
  map: WalkabilityMap,
  x: number,
  y: number,
  max_distance: number = get_pathfinding_config().escape_max_distance
): Path | null {
  const config = get_pathfinding_config();
  const origin: TilePosition = { x, y };

  let best: EscapeCandidate | null = null;
  let nearest_open: EscapeCandidate | null = null;

  for (let ring = 1; ring <= max_distance; ring++) {
    for (const [dx, dy] of ring_offsets(ring)) {
      const cx = x + dx;
      const cy = y + dy;
      if (!map.is_walkable(cx, cy)) continue;
      if (is_stuck(map, cx, cy, config.stuck_threshold)) continue;

      const wall_count = count_blocked_neighbors(map, cx, cy);
      const walkable_count = NEIGHBOR_OFFSETS.length - wall_count;
      const candidate: EscapeCandidate = {
        tile: { x: cx, y: cy },
        ring,
        score: ring + ESCAPE_WALL_WEIGHT * wall_count - ESCAPE_OPEN_WEIGHT * walkable_count,
      };

      if (!best || candidate.score < best.score) {
        best = candidate;
      }
      if (walkable_count >= config.open_space_min_walkable) {
        if (!nearest_open || candidate.ring < nearest_open.ring) {
          nearest_open = candidate;
        }
      }
    }
  }

  const chosen = nearest_open ?? best;
  if (chosen) {
    debug_verbose("EscapeRouter", "Escape target chosen", {
      from: origin,
      to: chosen.tile,
      open_space: chosen === nearest_open,
      score: chosen.score,
    });
    return escape_result(map, origin, chosen.tile);
  }

  // Emergency hop to the first usable immediate neighbor
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (map.is_walkable(nx, ny) && !is_stuck(map, nx, ny, config.stuck_threshold)) {
      debug_verbose("EscapeRouter", "Emergency hop", { from: origin, to: { x: nx, y: ny } });
      return escape_result(map, origin, { x: nx, y: ny });
    }
  }

  debug_verbose("EscapeRouter", "No escape available", { from: origin, max_distance });
  return null;
}
