/**
 * A* Core
 *
 * Weighted 8-directional A* over the tile grid. Edge costs carry the wall
 * penalty from the cost model, so the Euclidean heuristic under-weights them
 * and the search behaves as weighted A*: shapes favor open floor, optimality
 * is not guaranteed.
 *
 * Pipeline of find_path:
 * 1. Stuck start -> escape router
 * 2. Blocked target -> first walkable neighbor
 * 3. Same tile -> single waypoint
 * 4. Search (expansion capped)
 * 5. Reconstruct -> optimize_path -> truncate
 */

import type { Path, PixelPoint, TilePosition, WalkabilityMap } from "../types/grid.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";
import { debug_pipeline, debug_verbose } from "../shared/debug.js";
import { effective_clearance, is_doorway, wall_penalty } from "./cost_model.js";
import { NEIGHBOR_OFFSETS, pixel_to_tile, same_tile, tile_center, tile_key } from "./grid_geometry.js";
import { MinHeap } from "./open_set.js";
import { optimize_path } from "./post_processor.js";
import { find_escape_path, is_stuck } from "./stuck_detector.js";

/** One visited tile, owned by a single search call */
export type SearchNode = {
  x: number;
  y: number;
  parent: number;        // Arena index of predecessor, -1 at the start node
  g: number;
  h: number;
  f: number;
  wall_penalty: number;
  is_doorway: boolean;
};

type OpenEntry = {
  node: number;
  g: number;             // g at push time, stale once the node improves
  f: number;
  h: number;
  seq: number;
};

export type SearchResult = {
  tiles: TilePosition[];
  expansions: number;
};

function open_entry_less(a: OpenEntry, b: OpenEntry): boolean {
  if (a.f !== b.f) return a.f < b.f;
  if (a.h !== b.h) return a.h < b.h;
  return a.seq < b.seq;
}

function heuristic(x: number, y: number, goal: TilePosition): number {
  return Math.hypot(x - goal.x, y - goal.y);
}

function reconstruct_tiles(nodes: readonly SearchNode[], end_index: number): TilePosition[] {
  const tiles: TilePosition[] = [];
  let cur = end_index;
  while (cur !== -1) {
    const node = nodes[cur];
    if (!node) break;
    tiles.push({ x: node.x, y: node.y });
    cur = node.parent;
  }
  return tiles.reverse();
}

/**
 * First walkable neighbor of a blocked target, x offset outer, y offset inner
 */
export function find_walkable_neighbor(map: WalkabilityMap, tile: TilePosition): TilePosition | null {
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    if (map.is_walkable(tile.x + dx, tile.y + dy)) {
      return { x: tile.x + dx, y: tile.y + dy };
    }
  }
  return null;
}

/**
 * Raw A* between two tiles.
 *
 * @returns the tile chain from start to goal with the expansion count, or
 *          null when the goal is disconnected or the expansion cap is hit
 */
export function search_tiles(
  map: WalkabilityMap,
  start: TilePosition,
  goal: TilePosition,
  wall_clearance: number = get_pathfinding_config().default_wall_clearance,
  max_expansions: number = get_pathfinding_config().max_expansions
): SearchResult | null {
  const nodes: SearchNode[] = [];
  const index_by_tile = new Map<string, number>();
  const closed = new Set<string>();
  const open = new MinHeap<OpenEntry>(open_entry_less);
  let seq = 0;

  const push = (index: number, node: SearchNode): void => {
    open.push({ node: index, g: node.g, f: node.f, h: node.h, seq: seq++ });
  };

  const start_h = heuristic(start.x, start.y, goal);
  const start_node: SearchNode = {
    x: start.x,
    y: start.y,
    parent: -1,
    g: 0,
    h: start_h,
    f: start_h,
    wall_penalty: wall_penalty(map, start.x, start.y),
    is_doorway: is_doorway(map, start.x, start.y),
  };
  nodes.push(start_node);
  index_by_tile.set(tile_key(start.x, start.y), 0);
  push(0, start_node);

  let expansions = 0;

  while (open.size > 0) {
    const entry = open.pop();
    if (!entry) break;
    const current = nodes[entry.node];
    if (!current) continue;

    const current_key = tile_key(current.x, current.y);
    // Stale heap entry: already expanded, or improved after this push
    if (closed.has(current_key) || entry.g > current.g) continue;

    expansions++;
    if (expansions > max_expansions) {
      debug_pipeline("AStar", "Expansion cap reached", { start, goal, max_expansions });
      return null;
    }

    if (current.x === goal.x && current.y === goal.y) {
      return { tiles: reconstruct_tiles(nodes, entry.node), expansions };
    }

    closed.add(current_key);

    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      const nx = current.x + dx;
      const ny = current.y + dy;
      const neighbor_key = tile_key(nx, ny);
      if (closed.has(neighbor_key)) continue;
      if (!map.is_walkable(nx, ny)) continue;

      const diagonal = dx !== 0 && dy !== 0;
      // No corner cutting: both orthogonal tiles beside a diagonal step must be open
      if (diagonal && (!map.is_walkable(current.x + dx, current.y) || !map.is_walkable(current.x, current.y + dy))) {
        continue;
      }
      const movement_cost = diagonal ? Math.SQRT2 : 1.0;

      const known_index = index_by_tile.get(neighbor_key);
      const known = known_index === undefined ? undefined : nodes[known_index];
      const neighbor_penalty = known ? known.wall_penalty : wall_penalty(map, nx, ny);
      const neighbor_doorway = known ? known.is_doorway : is_doorway(map, nx, ny);

      const clearance = effective_clearance(current.is_doorway, neighbor_doorway, wall_clearance);
      const tentative_g = current.g + movement_cost + neighbor_penalty * clearance;

      if (known && tentative_g >= known.g) continue;

      const h = heuristic(nx, ny, goal);
      if (known && known_index !== undefined) {
        known.parent = entry.node;
        known.g = tentative_g;
        known.h = h;
        known.f = tentative_g + h;
        push(known_index, known);
      } else {
        const node: SearchNode = {
          x: nx,
          y: ny,
          parent: entry.node,
          g: tentative_g,
          h,
          f: tentative_g + h,
          wall_penalty: neighbor_penalty,
          is_doorway: neighbor_doorway,
        };
        const index = nodes.length;
        nodes.push(node);
        index_by_tile.set(neighbor_key, index);
        push(index, node);
      }
    }
  }

  debug_pipeline("AStar", "No path", { start, goal, expansions });
  return null;
}

/**
 * Find a walkable path between two pixel positions.
 *
 * @param start_px - Agent position in pixels
 * @param target_px - Pursuit target in pixels
 * @param max_distance - Waypoint cap on the returned path
 * @param wall_clearance - Wall penalty multiplier away from doorways
 * @returns tile-center waypoints, or null when nothing better than direct
 *          movement is available this tick
 */
export function find_path(
  map: WalkabilityMap,
  start_px: PixelPoint,
  target_px: PixelPoint,
  max_distance: number = get_pathfinding_config().default_max_distance,
  wall_clearance: number = get_pathfinding_config().default_wall_clearance
): Path | null {
  if (!Number.isInteger(max_distance) || max_distance < 1) {
    throw new RangeError(`max_distance must be a positive integer, got ${max_distance}`);
  }

  const config = get_pathfinding_config();
  const tile_size = map.tile_size;
  let start = pixel_to_tile(start_px, tile_size);
  let target = pixel_to_tile(target_px, tile_size);

  debug_verbose("AStar", "Pathfinding", { start_px, target_px, start, target });

  // Agent overlapping a wall or standing off the map: plan from the adjacent floor
  if (!map.is_walkable(start.x, start.y)) {
    const nearby = find_walkable_neighbor(map, start);
    if (!nearby) {
      debug_pipeline("AStar", "Start and its neighbors are blocked", { start });
      return null;
    }
    debug_verbose("AStar", "Start blocked, moving to neighbor", { from: start, to: nearby });
    start = nearby;
  }

  if (is_stuck(map, start.x, start.y, config.stuck_threshold)) {
    const escape = find_escape_path(map, start.x, start.y, config.escape_max_distance);
    if (escape) {
      debug_verbose("AStar", "Start tile is stuck, using escape path", { start });
      return escape;
    }
  }

  if (!map.is_walkable(target.x, target.y)) {
    const retarget = find_walkable_neighbor(map, target);
    if (!retarget) {
      debug_pipeline("AStar", "Target and its neighbors are blocked", { target });
      return null;
    }
    debug_verbose("AStar", "Target blocked, retargeting", { from: target, to: retarget });
    target = retarget;
  }

  if (same_tile(start, target)) {
    return [tile_center(start, tile_size)];
  }

  const result = search_tiles(map, start, target, wall_clearance, config.max_expansions);
  if (!result) return null;

  const raw = result.tiles.map((tile) => tile_center(tile, tile_size));
  const optimized = optimize_path(map, raw, wall_clearance);

  debug_verbose("AStar", "Path found", {
    expansions: result.expansions,
    raw_length: raw.length,
    optimized_length: optimized.length,
  });

  if (optimized.length > max_distance) {
    return optimized.slice(0, max_distance);
  }
  return optimized;
}
