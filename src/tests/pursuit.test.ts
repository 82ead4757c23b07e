// Pursuit steering: re-plan cadence and direct-vector fallback

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { create_pursuit_state, reset_pursuit, update_pursuit } from "../npc_ai/pursuit.js";
import { TileGridMap } from "../tile_storage/grid_map.js";

const TILE = 16;

function assert_close(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${expected}, got ${actual}`);
}

describe("update_pursuit", () => {
  it("follows a planned path toward the target", () => {
    const map = TileGridMap.open(10, 10, TILE);
    const state = create_pursuit_state("npc.hound");

    const command = update_pursuit(state, map, { x: 24, y: 24 }, { x: 152, y: 152 }, 0);

    assert.equal(command.mode, "path");
    assert.equal(command.replanned, true);
    assert.deepEqual(command.waypoint, { x: 152, y: 152 });
    assert_close(command.heading.x, Math.SQRT1_2);
    assert_close(command.heading.y, Math.SQRT1_2);
    assert.equal(state.path_index, 1);
  });

  it("re-plans at most once per interval", () => {
    const map = TileGridMap.open(10, 10, TILE);
    const state = create_pursuit_state("npc.hound", { repath_interval_ms: 1000 });

    update_pursuit(state, map, { x: 24, y: 24 }, { x: 152, y: 152 }, 0);
    const between = update_pursuit(state, map, { x: 40, y: 40 }, { x: 152, y: 152 }, 500);
    assert.equal(between.replanned, false);
    assert.equal(between.mode, "path");
    assert.equal(state.plan_count, 1);

    const due = update_pursuit(state, map, { x: 40, y: 40 }, { x: 152, y: 152 }, 1000);
    assert.equal(due.replanned, true);
    assert.equal(state.plan_count, 2);
    assert.deepEqual(state.path, [
      { x: 40, y: 40 },
      { x: 152, y: 152 },
    ]);
  });

  it("steers straight at the target when no path exists", () => {
    const map = TileGridMap.from_rows([
      ".....#...",
      ".....#...",
      ".....#...",
    ], TILE);
    const state = create_pursuit_state("npc.hound");

    const command = update_pursuit(state, map, { x: 24, y: 24 }, { x: 120, y: 24 }, 0);
    assert.equal(command.mode, "direct");
    assert.equal(command.waypoint, null);
    assert.deepEqual(command.heading, { x: 1, y: 0 });
    assert.equal(state.last_plan_failed, true);

    const later = update_pursuit(state, map, { x: 30, y: 24 }, { x: 120, y: 24 }, 400);
    assert.equal(later.mode, "direct");
    assert.equal(later.replanned, false);
    assert.equal(state.plan_count, 1);
  });

  it("idles once at the target", () => {
    const map = TileGridMap.open(10, 10, TILE);
    const state = create_pursuit_state("npc.hound");

    const command = update_pursuit(state, map, { x: 50, y: 50 }, { x: 51, y: 50 }, 0);
    assert.deepEqual(command, { mode: "idle", heading: { x: 0, y: 0 }, waypoint: null, replanned: false });
    assert.equal(state.plan_count, 0);
  });

  it("plans again right after a reset", () => {
    const map = TileGridMap.open(10, 10, TILE);
    const state = create_pursuit_state("npc.hound");

    update_pursuit(state, map, { x: 24, y: 24 }, { x: 152, y: 152 }, 0);
    reset_pursuit(state);
    assert.deepEqual(state.path, []);

    const command = update_pursuit(state, map, { x: 24, y: 24 }, { x: 152, y: 152 }, 10);
    assert.equal(command.replanned, true);
    assert.equal(state.plan_count, 2);
  });
});
