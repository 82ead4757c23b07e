/**
 * Grid Type Definitions
 *
 * Shapes shared by the planner, the tile map and the agents that consume paths.
 * Tile coordinates are integer cell addresses; pixel coordinates are world space.
 */

/**
 * Integer grid-cell address
 */
export type TilePosition = {
  x: number;
  y: number;
};

/**
 * A point in pixel space. Waypoints are always tile centers.
 */
export type PixelPoint = {
  x: number;
  y: number;
};

/**
 * Ordered waypoints, front = start, back = destination (or the nearest
 * reachable approximation of it)
 */
export type Path = PixelPoint[];

/**
 * The map collaborator the planner reads from. Must answer false for
 * coordinates outside the map.
 */
export interface WalkabilityMap {
  readonly tile_size: number;
  is_walkable(tile_x: number, tile_y: number): boolean;
}
