import type { MapContext } from "./context.js";
import type { Range, Tile, TileType } from "./types.js";

function inAnyRange(ranges: readonly Range[], value: number): boolean {
  return ranges.some((r) => value >= r.min && value <= r.max);
}

/** True when every attribute of the tile falls in one of the type's ranges. */
export function tileTypeMatches(type: TileType, tile: Pick<Tile, "elevation" | "temperature" | "precipitation">): boolean {
  return (
    inAnyRange(type.elevation, tile.elevation) &&
    inAnyRange(type.temperature, tile.temperature) &&
    inAnyRange(type.precipitation, tile.precipitation)
  );
}

/** Indices of every tile type the tile qualifies for. */
export function matchingTileTypes(
  tile: Pick<Tile, "elevation" | "temperature" | "precipitation">,
  types: readonly TileType[]
): number[] {
  const out: number[] = [];
  types.forEach((t, i) => {
    if (tileTypeMatches(t, tile)) out.push(i);
  });
  return out;
}

/**
 * Assign each tile one of its matching types, chosen uniformly with the run
 * RNG. Tiles matching nothing get null. Returns the count of those.
 */
export function classifyBiomes(ctx: MapContext): number {
  const { params, grid, rng, log } = ctx;

  let unmatched = 0;
  for (const tile of grid.tiles) {
    const candidates = matchingTileTypes(tile, params.tileTypes);
    if (candidates.length === 0) {
      tile.type = null;
      unmatched++;
    } else {
      tile.type = rng.choice(candidates);
    }
  }

  log.debug(`biomes: ${grid.size - unmatched} typed, ${unmatched} match no tile type`);
  return unmatched;
}
