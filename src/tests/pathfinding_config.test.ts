// Pathfinding config: defaults, jsonc overrides, cache

import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  DEFAULT_PATHFINDING_CONFIG,
  clear_pathfinding_config_cache,
  get_pathfinding_config,
  load_pathfinding_config,
  merge_pathfinding_config,
  parse_pathfinding_config,
  set_pathfinding_config,
} from "../shared/pathfinding_config.js";

describe("pathfinding config", () => {
  afterEach(() => {
    clear_pathfinding_config_cache();
  });

  it("applies overrides from jsonc", () => {
    const config = parse_pathfinding_config(`{
      // faster re-planning for tests
      "repath_interval_ms": 250,
      "max_expansions": 800,
    }`);

    assert.equal(config.repath_interval_ms, 250);
    assert.equal(config.max_expansions, 800);
    assert.equal(config.tile_size, DEFAULT_PATHFINDING_CONFIG.tile_size);
  });

  it("ignores unknown keys and non-positive values", () => {
    const config = merge_pathfinding_config({
      schema_version: 1,
      tile_size: -4,
      stuck_threshold: "3",
      made_up_key: 7,
      escape_max_distance: 12,
    });

    assert.deepEqual(config, { ...DEFAULT_PATHFINDING_CONFIG, escape_max_distance: 12 });
  });

  it("falls back to defaults on a syntax error", () => {
    assert.deepEqual(parse_pathfinding_config(`{ "tile_size": `), { ...DEFAULT_PATHFINDING_CONFIG });
  });

  it("falls back to defaults for a non-object document", () => {
    assert.deepEqual(parse_pathfinding_config(`[1, 2]`), { ...DEFAULT_PATHFINDING_CONFIG });
  });

  it("uses defaults when the file is missing", () => {
    assert.deepEqual(load_pathfinding_config("local_data/shared/pathfinding/missing.jsonc"), {
      ...DEFAULT_PATHFINDING_CONFIG,
    });
  });

  it("ships a config file matching the defaults", () => {
    assert.deepEqual(
      load_pathfinding_config("local_data/shared/pathfinding/default_pathfinding.jsonc"),
      { ...DEFAULT_PATHFINDING_CONFIG }
    );
  });

  it("caches the active config until cleared", () => {
    const first = get_pathfinding_config();
    assert.equal(get_pathfinding_config(), first);

    set_pathfinding_config({ stuck_threshold: 4 });
    assert.equal(get_pathfinding_config().stuck_threshold, 4);

    clear_pathfinding_config_cache();
    assert.equal(get_pathfinding_config().stuck_threshold, DEFAULT_PATHFINDING_CONFIG.stuck_threshold);
  });
});
