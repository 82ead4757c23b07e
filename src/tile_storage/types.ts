// Tile Storage Types
// Type definitions for tile layout files

export type TileCategory = "floor" | "wall";

/** Characters treated as walkable when a layout does not list its own */
export const DEFAULT_WALKABLE_CHARS = ".";

export interface TileLayout {
  schema_version: 1;
  id?: string;
  tile_size: number;
  walkable_chars?: string;    // Every char in this string is floor
  rows: string[];             // Row 0 is the top (y = 0)
}
