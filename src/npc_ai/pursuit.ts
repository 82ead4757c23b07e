/**
 * NPC Pursuit Steering
 *
 * Drives the planner for an agent chasing a moving target. Paths are
 * re-planned at most once per repath interval (not every tick); between
 * plans the agent walks the current waypoints. When the planner has nothing
 * (null result or waypoints used up) the agent steers straight at the target.
 */

import type { Path, PixelPoint, WalkabilityMap } from "../types/grid.js";
import { debug_verbose } from "../shared/debug.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";
import { find_path } from "../pathfinding/astar.js";
import { distance } from "../pathfinding/grid_geometry.js";

/** How the agent should move this tick */
export type SteeringMode =
  | "path"      // Heading toward the next waypoint
  | "direct"    // No usable path, heading straight at the target
  | "idle";     // Already at the target

export type SteeringCommand = {
  mode: SteeringMode;
  heading: PixelPoint;             // Unit vector, zero when idle
  waypoint: PixelPoint | null;
  replanned: boolean;
};

export type PursuitOptions = {
  repath_interval_ms?: number;
  max_distance?: number;
  wall_clearance?: number;
  arrive_radius_px?: number;       // Default: a quarter tile
};

export type PursuitState = {
  agent_ref: string;
  path: Path;
  path_index: number;
  last_plan_time: number | null;
  last_plan_failed: boolean;
  plan_count: number;
  options: PursuitOptions;
};

export function create_pursuit_state(agent_ref: string, options: PursuitOptions = {}): PursuitState {
  return {
    agent_ref,
    path: [],
    path_index: 0,
    last_plan_time: null,
    last_plan_failed: false,
    plan_count: 0,
    options,
  };
}

/**
 * Drop the current path so the next update plans again
 */
export function reset_pursuit(state: PursuitState): void {
  state.path = [];
  state.path_index = 0;
  state.last_plan_time = null;
  state.last_plan_failed = false;
}

function unit_vector(from: PixelPoint, to: PixelPoint): PixelPoint {
  const length = distance(from, to);
  if (length === 0) return { x: 0, y: 0 };
  return { x: (to.x - from.x) / length, y: (to.y - from.y) / length };
}

function plan_due(state: PursuitState, now_ms: number, interval_ms: number): boolean {
  return state.last_plan_time === null || now_ms - state.last_plan_time >= interval_ms;
}

/**
 * Advance pursuit by one tick
 */
export function update_pursuit(
  state: PursuitState,
  map: WalkabilityMap,
  position_px: PixelPoint,
  target_px: PixelPoint,
  now_ms: number
): SteeringCommand {
  const config = get_pathfinding_config();
  const arrive_radius = state.options.arrive_radius_px ?? map.tile_size / 4;

  if (distance(position_px, target_px) <= arrive_radius) {
    return { mode: "idle", heading: { x: 0, y: 0 }, waypoint: null, replanned: false };
  }

  let replanned = false;
  if (plan_due(state, now_ms, state.options.repath_interval_ms ?? config.repath_interval_ms)) {
    const path = find_path(
      map,
      position_px,
      target_px,
      state.options.max_distance ?? config.default_max_distance,
      state.options.wall_clearance ?? config.default_wall_clearance
    );
    state.path = path ?? [];
    state.path_index = 0;
    state.last_plan_time = now_ms;
    state.last_plan_failed = path === null;
    state.plan_count++;
    replanned = true;

    debug_verbose("Pursuit", `${state.agent_ref} planned`, {
      waypoints: state.path.length,
      failed: state.last_plan_failed,
    });
  }

  // Consume waypoints the agent has already reached
  let waypoint = state.path[state.path_index];
  while (waypoint && distance(position_px, waypoint) <= arrive_radius) {
    state.path_index++;
    waypoint = state.path[state.path_index];
  }

  if (waypoint) {
    return { mode: "path", heading: unit_vector(position_px, waypoint), waypoint, replanned };
  }

  return { mode: "direct", heading: unit_vector(position_px, target_px), waypoint: null, replanned };
}
