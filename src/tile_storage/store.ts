// Tile Storage Module
// Loads tile layouts from jsonc files and builds walkability maps

import * as fs from "node:fs";
import * as path from "node:path";
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { debug_error, debug_warn } from "../shared/debug.js";
import { TileGridMap } from "./grid_map.js";
import { DEFAULT_WALKABLE_CHARS, type TileLayout } from "./types.js";

const DEFAULT_LAYOUT_DIR = "local_data/shared/tiles";

let layoutCache: Map<string, TileGridMap> | null = null;

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function is_string_array(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((row) => typeof row === "string");
}

/**
 * Check a parsed value against the layout shape
 */
export function validate_tile_layout(value: unknown): TileLayout | string {
  if (!is_record(value)) return "layout must be an object";
  if (value.schema_version !== 1) return `unsupported schema_version ${String(value.schema_version)}`;

  const { tile_size, rows, walkable_chars, id } = value;
  if (typeof tile_size !== "number" || !Number.isFinite(tile_size) || tile_size <= 0) {
    return "tile_size must be a positive number";
  }
  if (!is_string_array(rows) || rows.length === 0) return "rows must be a non-empty string array";
  if (walkable_chars !== undefined) {
    if (typeof walkable_chars !== "string" || walkable_chars.length === 0) {
      return "walkable_chars must be a non-empty string";
    }
  }
  if (id !== undefined && typeof id !== "string") return "id must be a string";

  const width = rows[0]?.length ?? 0;
  const ragged = rows.findIndex((row) => row.length !== width);
  if (ragged !== -1) return `row ${ragged} has width ${rows[ragged]?.length}, expected ${width}`;

  const layout: TileLayout = { schema_version: 1, tile_size, rows };
  if (typeof walkable_chars === "string") layout.walkable_chars = walkable_chars;
  if (typeof id === "string") layout.id = id;
  return layout;
}

/**
 * Parse jsonc layout text into a map
 */
export function parse_tile_layout(raw: string, source = "inline"): TileGridMap | null {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(raw, errors, { allowTrailingComma: true });

  const first_error = errors[0];
  if (first_error) {
    debug_error("TileStorage", `Invalid jsonc in ${source}`, `${printParseErrorCode(first_error.error)} at offset ${first_error.offset}`);
    return null;
  }

  const layout = validate_tile_layout(parsed);
  if (typeof layout === "string") {
    debug_error("TileStorage", `Invalid tile layout in ${source}`, layout);
    return null;
  }

  return TileGridMap.from_rows(layout.rows, layout.tile_size, layout.walkable_chars ?? DEFAULT_WALKABLE_CHARS);
}

/**
 * Load a tile layout from disk
 */
export function load_tile_layout(file_path: string): TileGridMap | null {
  try {
    const fullPath = path.resolve(file_path);

    if (!fs.existsSync(fullPath)) {
      debug_warn(`[TileStorage] Tile layout not found: ${fullPath}`);
      return null;
    }

    const raw = fs.readFileSync(fullPath, "utf-8");
    return parse_tile_layout(raw, fullPath);
  } catch (error) {
    debug_error("TileStorage", `Error loading tile layout ${file_path}`, error);
    return null;
  }
}

/**
 * Get a layout by id from the shared tile directory, cached after first load
 */
export function get_tile_layout(layout_id: string, layout_dir: string = DEFAULT_LAYOUT_DIR): TileGridMap | null {
  if (!layoutCache) {
    layoutCache = new Map();
  }

  const cache_key = `${layout_dir}:${layout_id}`;
  const cached = layoutCache.get(cache_key);
  if (cached) return cached;

  const map = load_tile_layout(path.join(layout_dir, `${layout_id}.jsonc`));
  if (map) {
    layoutCache.set(cache_key, map);
  }
  return map;
}

/**
 * Clear the layout cache (useful for reloading)
 */
export function clear_tile_layout_cache(): void {
  layoutCache = null;
}
