// Pathfinding Module - Main exports
// Collision-aware paths for agents on the tile grid

// Cost model exports
export {
  is_doorway,
  wall_penalty,
  effective_clearance
} from "./cost_model.js";

// Stuck detection exports
export {
  is_stuck,
  find_escape_path
} from "./stuck_detector.js";

// Search exports
export {
  find_path,
  search_tiles,
  find_walkable_neighbor,
  type SearchNode,
  type SearchResult
} from "./astar.js";

// Post-processing exports
export {
  optimize_path,
  simplify_path,
  segment_is_clear
} from "./post_processor.js";

// Geometry exports
export {
  NEIGHBOR_OFFSETS,
  pixel_to_tile,
  tile_center,
  same_tile,
  tile_key,
  count_blocked_neighbors,
  distance,
  path_length
} from "./grid_geometry.js";

export { MinHeap } from "./open_set.js";
