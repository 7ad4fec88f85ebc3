import type { MapContext } from "./context.js";
import { clamp } from "./math.js";
import type { TileGrid } from "./topology.js";
import type { Tile } from "./types.js";

/**
 * Multi-source nearest-ocean search.
 *
 * Every ocean tile seeds the queue as its own nearest ocean. Popping a tile
 * offers its nearest ocean to each neighbour; a neighbour that had none, or
 * one strictly farther away (physical, wrap-aware), adopts it and is queued
 * again. Tiles may be revisited whenever a better source reaches them.
 *
 * Returns the number of queue pops.
 */
export function computeNearestOcean(grid: TileGrid): number {
  const queue: Tile[] = [];

  for (const tile of grid.tiles) {
    if (grid.isOcean(tile)) {
      tile.nearestOcean = { x: tile.x, y: tile.y };
      queue.push(tile);
    } else {
      tile.nearestOcean = null;
    }
  }

  let qi = 0;
  for (; qi < queue.length; qi++) {
    const curr = queue[qi];
    const source = curr.nearestOcean;
    if (source === null) continue;

    for (const nb of grid.neighbors4(curr)) {
      const known = nb.nearestOcean;
      if (known === null || grid.distanceSq(nb, source) < grid.distanceSq(nb, known)) {
        nb.nearestOcean = { x: source.x, y: source.y };
        queue.push(nb);
      }
    }
  }

  return qi;
}

/**
 * Divide land rainfall by exp(distance / e-folding distance).
 * Land with no known ocean (an all-land map) keeps its rainfall.
 */
export function attenuateByOceanDistance(ctx: MapContext): void {
  const { params, grid, log } = ctx;

  const pops = computeNearestOcean(grid);

  let unreached = 0;
  for (const tile of grid.tiles) {
    if (grid.isOcean(tile)) continue;
    if (tile.nearestOcean === null) {
      unreached++;
      continue;
    }
    const distance = Math.sqrt(grid.distanceSq(tile, tile.nearestOcean));
    if (tile.precipitation === 0) continue;
    // a negative e-folding distance grows rain inland; keep it finite
    const factor = Math.exp(-distance / params.rainfallOceanEFoldingDistance);
    tile.precipitation = clamp(tile.precipitation * factor, 0, Number.MAX_VALUE);
  }

  log.debug(`ocean distance: ${pops} relaxations, ${unreached} land tiles without an ocean`);
}
