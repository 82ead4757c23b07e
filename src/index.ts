// Public entry point

export * from "./pathfinding/index.js";

export type { TilePosition, PixelPoint, Path, WalkabilityMap } from "./types/grid.js";

export { TileGridMap } from "./tile_storage/grid_map.js";
export {
  parse_tile_layout,
  load_tile_layout,
  get_tile_layout,
  validate_tile_layout,
  clear_tile_layout_cache
} from "./tile_storage/store.js";
export type { TileLayout, TileCategory } from "./tile_storage/types.js";

export {
  create_pursuit_state,
  update_pursuit,
  reset_pursuit,
  type PursuitState,
  type PursuitOptions,
  type SteeringCommand,
  type SteeringMode
} from "./npc_ai/pursuit.js";

export {
  DEFAULT_PATHFINDING_CONFIG,
  get_pathfinding_config,
  set_pathfinding_config,
  load_pathfinding_config,
  parse_pathfinding_config,
  merge_pathfinding_config,
  clear_pathfinding_config_cache,
  type PathfindingConfig
} from "./shared/pathfinding_config.js";
