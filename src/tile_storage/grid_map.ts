/**
 * Tile Grid Map
 *
 * In-memory walkability grid built from character rows. This is the map
 * collaborator handed to the planner; anything outside the grid is a wall.
 */

import type { WalkabilityMap } from "../types/grid.js";
import { get_pathfinding_config } from "../shared/pathfinding_config.js";
import { DEFAULT_WALKABLE_CHARS, type TileCategory } from "./types.js";

export class TileGridMap implements WalkabilityMap {
  readonly width: number;
  readonly height: number;
  readonly tile_size: number;
  private readonly cells: Uint8Array;  // 1 = walkable

  constructor(width: number, height: number, tile_size: number = get_pathfinding_config().tile_size) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`grid dimensions must be non-negative integers, got ${width}x${height}`);
    }
    if (!Number.isFinite(tile_size) || tile_size <= 0) {
      throw new RangeError(`tile_size must be a positive number, got ${tile_size}`);
    }
    this.width = width;
    this.height = height;
    this.tile_size = tile_size;
    this.cells = new Uint8Array(width * height);
  }

  /**
   * Build a map from rows of characters, row 0 at the top.
   * Characters in walkable_chars are floor, everything else is wall.
   */
  static from_rows(
    rows: readonly string[],
    tile_size: number = get_pathfinding_config().tile_size,
    walkable_chars: string = DEFAULT_WALKABLE_CHARS
  ): TileGridMap {
    const width = rows[0]?.length ?? 0;
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new RangeError(`row ${y} has width ${row.length}, expected ${width}`);
      }
    });

    const map = new TileGridMap(width, rows.length, tile_size);
    rows.forEach((row, y) => {
      for (let x = 0; x < row.length; x++) {
        map.set_walkable(x, y, walkable_chars.includes(row.charAt(x)));
      }
    });
    return map;
  }

  /** Every tile walkable */
  static open(width: number, height: number, tile_size: number = get_pathfinding_config().tile_size): TileGridMap {
    const map = new TileGridMap(width, height, tile_size);
    map.cells.fill(1);
    return map;
  }

  in_bounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  is_walkable(tile_x: number, tile_y: number): boolean {
    if (!this.in_bounds(tile_x, tile_y)) return false;
    return this.cells[tile_y * this.width + tile_x] === 1;
  }

  set_walkable(tile_x: number, tile_y: number, walkable: boolean): void {
    if (!this.in_bounds(tile_x, tile_y)) {
      throw new RangeError(`tile (${tile_x}, ${tile_y}) is outside the ${this.width}x${this.height} grid`);
    }
    this.cells[tile_y * this.width + tile_x] = walkable ? 1 : 0;
  }

  get_category(tile_x: number, tile_y: number): TileCategory {
    return this.is_walkable(tile_x, tile_y) ? "floor" : "wall";
  }

  /** Render back to rows of '.' and '#' */
  to_rows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        row += this.is_walkable(x, y) ? "." : "#";
      }
      rows.push(row);
    }
    return rows;
  }
}
