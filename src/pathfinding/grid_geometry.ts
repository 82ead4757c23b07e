/**
 * Grid Geometry
 *
 * Pixel <-> tile conversion and neighborhood helpers shared by every planner stage.
 */

import type { PixelPoint, TilePosition, WalkabilityMap } from "../types/grid.js";

/** The 8 neighbor offsets, x offset outer, y offset inner */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
];

function assert_tile_size(tile_size: number): void {
  if (!Number.isFinite(tile_size) || tile_size <= 0) {
    throw new RangeError(`tile_size must be a positive number, got ${tile_size}`);
  }
}

/**
 * Floor-divide a pixel position into the tile that contains it
 */
export function pixel_to_tile(point: PixelPoint, tile_size: number): TilePosition {
  assert_tile_size(tile_size);
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new RangeError(`pixel position must be finite, got (${point.x}, ${point.y})`);
  }
  return {
    x: Math.floor(point.x / tile_size),
    y: Math.floor(point.y / tile_size),
  };
}

/**
 * Pixel center of a tile
 */
export function tile_center(tile: TilePosition, tile_size: number): PixelPoint {
  assert_tile_size(tile_size);
  const half = Math.floor(tile_size / 2);
  return {
    x: tile.x * tile_size + half,
    y: tile.y * tile_size + half,
  };
}

export function same_tile(a: TilePosition, b: TilePosition): boolean {
  return a.x === b.x && a.y === b.y;
}

export function tile_key(x: number, y: number): string {
  return `${x},${y}`;
}

/**
 * How many of the 8 surrounding tiles are not walkable
 */
export function count_blocked_neighbors(map: WalkabilityMap, x: number, y: number): number {
  let blocked = 0;
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    if (!map.is_walkable(x + dx, y + dy)) blocked++;
  }
  return blocked;
}

export function distance(a: PixelPoint, b: PixelPoint): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Total polyline length in pixels
 */
export function path_length(path: readonly PixelPoint[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const cur = path[i];
    if (prev && cur) total += distance(prev, cur);
  }
  return total;
}
