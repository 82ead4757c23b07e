// Pathfinding Configuration
// Tuning constants for the planner, overridable from a jsonc file

import * as fs from "node:fs";
import * as path from "node:path";
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { debug_config_warning, debug_error, debug_log } from "./debug.js";

const DEFAULT_CONFIG_PATH = "local_data/shared/pathfinding/default_pathfinding.jsonc";

export type PathfindingConfig = {
  tile_size: number;                 // Pixel edge length of one tile
  max_expansions: number;            // A* gives up after this many node expansions
  default_max_distance: number;      // Waypoint cap on returned paths
  default_wall_clearance: number;    // Multiplier on wall penalty away from doorways
  doorway_clearance: number;         // Multiplier used when a doorway is involved
  wall_penalty_radius: number;       // Square scan radius of wall_penalty
  orthogonal_wall_penalty: number;   // Flat cost per blocked orthogonal neighbor
  doorway_wall_penalty: number;      // Same, when the tile is a doorway
  stuck_threshold: number;           // Blocked neighbors that make a tile stuck
  escape_max_distance: number;       // Ring radius searched by the escape router
  open_space_min_walkable: number;   // Walkable neighbors needed for an open space
  clearance_tile_fraction: number;   // Pixels of clearance per unit, as a tile fraction
  repath_interval_ms: number;        // Pursuit re-plan cadence
};

export const DEFAULT_PATHFINDING_CONFIG: Readonly<PathfindingConfig> = Object.freeze({
  tile_size: 32,
  max_expansions: 500,
  default_max_distance: 20,
  default_wall_clearance: 1.5,
  doorway_clearance: 0.5,
  wall_penalty_radius: 2,
  orthogonal_wall_penalty: 2.0,
  doorway_wall_penalty: 0.5,
  stuck_threshold: 3,
  escape_max_distance: 8,
  open_space_min_walkable: 5,
  clearance_tile_fraction: 0.25,
  repath_interval_ms: 1000,
});

let config_cache: PathfindingConfig | null = null;

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function is_config_key(key: string): key is keyof PathfindingConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_PATHFINDING_CONFIG, key);
}

/**
 * Merge raw override values onto the defaults.
 * Non-numeric, non-positive and unknown entries are skipped with a warning.
 */
export function merge_pathfinding_config(
  raw: unknown,
  source = "overrides"
): PathfindingConfig {
  const merged: PathfindingConfig = { ...DEFAULT_PATHFINDING_CONFIG };
  if (!is_record(raw)) {
    if (raw !== undefined) {
      debug_config_warning("[PathfindingConfig]", `${source}: expected an object, using defaults`);
    }
    return merged;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === "schema_version") continue;
    if (!is_config_key(key)) {
      debug_config_warning("[PathfindingConfig]", `${source}: unknown key "${key}" ignored`);
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
      debug_config_warning("[PathfindingConfig]", `${source}: "${key}" must be a positive number`);
      continue;
    }
    merged[key] = value;
  }

  return merged;
}

/**
 * Parse jsonc text into a config. Syntax errors fall back to the defaults.
 */
export function parse_pathfinding_config(raw: string, source = "inline"): PathfindingConfig {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(raw, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const first = errors[0];
    const detail = first ? `${printParseErrorCode(first.error)} at offset ${first.offset}` : "unknown";
    debug_error("PathfindingConfig", `Invalid jsonc in ${source}`, detail);
    return { ...DEFAULT_PATHFINDING_CONFIG };
  }

  return merge_pathfinding_config(parsed, source);
}

/**
 * Load the config file from disk
 */
export function load_pathfinding_config(file_path?: string): PathfindingConfig {
  const fullPath = path.resolve(file_path ?? process.env.PATHFINDING_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);

  try {
    if (!fs.existsSync(fullPath)) {
      debug_log(`[PathfindingConfig] No config at ${fullPath}, using defaults`);
      return { ...DEFAULT_PATHFINDING_CONFIG };
    }
    const raw = fs.readFileSync(fullPath, "utf-8");
    return parse_pathfinding_config(raw, fullPath);
  } catch (error) {
    debug_error("PathfindingConfig", `Error reading ${fullPath}`, error);
    return { ...DEFAULT_PATHFINDING_CONFIG };
  }
}

/**
 * Get the active config, loading it on first use
 */
export function get_pathfinding_config(): PathfindingConfig {
  if (!config_cache) {
    config_cache = load_pathfinding_config();
  }
  return config_cache;
}

/**
 * Replace part of the active config (tests, tools)
 */
export function set_pathfinding_config(overrides: Partial<PathfindingConfig>): PathfindingConfig {
  config_cache = merge_pathfinding_config({ ...get_pathfinding_config(), ...overrides }, "set_pathfinding_config");
  return config_cache;
}

/**
 * Clear the config cache (useful for reloading)
 */
export function clear_pathfinding_config_cache(): void {
  config_cache = null;
}
