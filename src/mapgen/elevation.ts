import type { MapContext } from "./context.js";
import { emptyOceanQuantileGap, fallbackMaxElevation } from "./constants.js";
import { clamp } from "./math.js";
import { embeddingDimensions, makeWrappedNoise } from "./noise.js";
import type { TileType } from "./types.js";

/** Highest elevation bound declared by any tile type (fallback when none is positive). */
export function highestElevation(types: readonly TileType[]): number {
  let best = -Infinity;
  for (const t of types) {
    for (const r of t.elevation) if (r.max > best) best = r.max;
  }
  return best > 0 ? best : fallbackMaxElevation;
}

/**
 * Raw value at or below which exactly `oceanCount` of the sorted values lie
 * (assuming distinct values). With no ocean it sits just under the minimum.
 */
export function oceanQuantile(sorted: readonly number[], oceanCount: number): number {
  if (oceanCount <= 0) return sorted[0] - emptyOceanQuantileGap;
  return sorted[Math.min(oceanCount, sorted.length) - 1];
}

/**
 * Fill tile elevations from wrapped simplex noise and calibrate sea level
 * so exactly floor(N · oceanCoverage) tiles, the lowest by raw value, end at
 * or below 0 m. Elevation is
 * (raw - q) · scale with scale = tallest tile type / (max(1, maxRaw) - q),
 * so no land rises above the tallest tile type.
 *
 * Draws one noise offset per embedding dimension from the run RNG.
 */
export function generateElevation(ctx: MapContext): { quantile: number; scale: number; oceanCount: number } {
  const { params, grid, rng, log } = ctx;

  const dims = embeddingDimensions(grid.wrapX, grid.wrapY);
  const offsets: number[] = [];
  for (let d = 0; d < dims; d++) offsets.push(rng.floatIn(0, 256));

  const sample = makeWrappedNoise(
    {
      width: grid.width,
      height: grid.height,
      wrapX: grid.wrapX,
      wrapY: grid.wrapY,
      tileScale: grid.tileScale,
      noiseScale: params.noiseScale,
    },
    offsets
  );

  const raw = grid.tiles.map((t) => sample(t.x, t.y));
  const sorted = raw.slice().sort((a, b) => a - b);
  // rank of each tile by raw value, ties broken by id
  const order = grid.tiles.map((t) => t.id).sort((a, b) => raw[a] - raw[b] || a - b);
  const rank = new Array<number>(grid.size);
  order.forEach((id, r) => (rank[id] = r));

  const oceanCount = Math.floor(grid.size * params.oceanCoverage);
  const quantile = oceanQuantile(sorted, oceanCount);
  const maxRaw = sorted[sorted.length - 1];
  const span = Math.max(1, maxRaw) - quantile || 1;
  const maxElevation = highestElevation(params.tileTypes);
  const scale = maxElevation / span;

  for (const tile of grid.tiles) {
    // (raw - q) / span <= 1 keeps land at or below maxElevation
    const e = ((raw[tile.id] - quantile) / span) * maxElevation;
    // tiles tied with the sea-level value but ranked past it stay land
    const lo = rank[tile.id] < oceanCount ? -Number.MAX_VALUE : Number.MIN_VALUE;
    tile.elevation = clamp(e, lo, Number.MAX_VALUE);
  }

  log.debug(`elevation: ${dims}D noise, sea level at raw ${quantile.toFixed(4)}, ${oceanCount} ocean tiles`);
  return { quantile, scale, oceanCount };
}
