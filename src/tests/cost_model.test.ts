// Grid cost model: doorway detection and wall penalty shaping

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { effective_clearance, is_doorway, wall_penalty } from "../pathfinding/cost_model.js";
import { TileGridMap } from "../tile_storage/grid_map.js";

function assert_close(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${expected}, got ${actual}`);
}

describe("is_doorway", () => {
  // Vertical corridor through a wall
  const corridor = TileGridMap.from_rows([
    "#.#",
    "#.#",
    "#.#",
  ], 16);

  // Horizontal wall with a gap in the middle
  const wall_gap = TileGridMap.from_rows([
    "...",
    "#.#",
    "...",
  ], 16);

  it("is true for a walkable tile flanked east and west", () => {
    assert.equal(is_doorway(corridor, 1, 1), true);
    assert.equal(is_doorway(wall_gap, 1, 1), true);
  });

  it("is true for a walkable tile flanked north and south", () => {
    const gap = TileGridMap.from_rows([
      ".#.",
      "...",
      ".#.",
    ], 16);
    assert.equal(is_doorway(gap, 1, 1), true);
    assert.equal(is_doorway(gap, 0, 1), false);
  });

  it("is false for a cell closed on both axes", () => {
    const cell = TileGridMap.from_rows([
      "###",
      "#.#",
      "###",
    ], 16);
    assert.equal(is_doorway(cell, 1, 1), false);
  });

  it("is false for wall tiles", () => {
    assert.equal(is_doorway(corridor, 0, 1), false);
    assert.equal(is_doorway(wall_gap, 0, 1), false);
  });

  it("is false when neither axis is closed on both sides", () => {
    assert.equal(is_doorway(wall_gap, 1, 0), false);
    assert.equal(is_doorway(wall_gap, 1, 2), false);
  });

  it("is false in open floor", () => {
    const open = TileGridMap.open(5, 5, 16);
    assert.equal(is_doorway(open, 2, 2), false);
  });

  it("follows map edits", () => {
    const map = TileGridMap.open(3, 3, 16);
    assert.equal(is_doorway(map, 1, 1), false);
    map.set_walkable(0, 1, false);
    map.set_walkable(2, 1, false);
    assert.equal(is_doorway(map, 1, 1), true);
  });
});

describe("wall_penalty", () => {
  it("is zero with no walls in range", () => {
    const open = TileGridMap.open(5, 5, 16);
    assert.equal(wall_penalty(open, 2, 2), 0);
  });

  it("treats out-of-range tiles as walls", () => {
    const open = TileGridMap.open(5, 5, 16);
    // x = -1 column: orthogonal 2.0, two diagonals, two at distance sqrt(5)
    // x = -2 column: 1/2, two at sqrt(5), two at sqrt(8)
    const expected = 2 + 2 / Math.SQRT2 + 4 / Math.sqrt(5) + 0.5 + 2 / Math.sqrt(8);
    assert_close(wall_penalty(open, 0, 2), expected);
  });

  it("charges the flat orthogonal cost next to a wall", () => {
    const open = TileGridMap.open(3, 3, 16);
    // Row y = -1 is outside: one orthogonal and two diagonal walls
    assert_close(wall_penalty(open, 1, 0, 1), 2 + 2 / Math.SQRT2);
  });

  it("charges doorways the reduced orthogonal cost", () => {
    const corridor = TileGridMap.from_rows([
      "#.#",
      "#.#",
      "#.#",
    ], 16);
    assert_close(wall_penalty(corridor, 1, 1, 1), 0.5 + 0.5 + 4 / Math.SQRT2);
  });
});

describe("wall_penalty at doorways", () => {
  it("charges the reduced orthogonal cost for walls north and south", () => {
    const gap = TileGridMap.from_rows([
      ".#.",
      "...",
      ".#.",
    ], 16);
    assert_close(wall_penalty(gap, 1, 1, 1), 0.5 + 0.5);
  });

  it("charges an enclosed cell the full orthogonal cost", () => {
    const cell = TileGridMap.from_rows([
      "###",
      "#.#",
      "###",
    ], 16);
    assert_close(wall_penalty(cell, 1, 1, 1), 4 * 2 + 4 / Math.SQRT2);
  });
});

describe("effective_clearance", () => {
  it("relaxes to the doorway clearance when either end is a doorway", () => {
    assert.equal(effective_clearance(true, false, 1.5), 0.5);
    assert.equal(effective_clearance(false, true, 1.5), 0.5);
  });

  it("uses the caller clearance otherwise", () => {
    assert.equal(effective_clearance(false, false, 1.5), 1.5);
    assert.equal(effective_clearance(false, false, 3), 3);
  });
});
