import type { MapContext } from "./context.js";
import { Logger } from "./logger.js";
import { SeededRandom, seedFromClock } from "./rng.js";
import { TileGrid } from "./topology.js";
import type { MapOutputs } from "./types.js";
import { parseMapParameters, parseSeed, validateParameters } from "./params.js";
import { generateElevation } from "./elevation.js";
import { applyClimate } from "./climate.js";
import { attenuateByOceanDistance } from "./oceanDistance.js";
import { applyOrographicRainfall } from "./orographic.js";
import { buildRivers, riverCorners } from "./rivers.js";
import { classifyBiomes } from "./biomes.js";

const log = Logger.scope("MAPGEN");

export interface GenerateOptions {
  /** Overrides params.seed */
  seed?: number;
  /** Clock used when no seed is given */
  now?: () => number;
}

/**
 * End-to-end map run: elevation, temperature, rainfall (latitude, ocean
 * distance, orographic), rivers, biomes. Each stage reads what the previous
 * one finished, so the order is fixed.
 * Returns compute-only per-tile data and the river overlay. Rendering is separate.
 */
export function generateMap(input: unknown = {}, options: GenerateOptions = {}): MapOutputs {
  // 0) Parameters: shape check, then clamp
  const { params, warnings } = validateParameters(parseMapParameters(input));
  for (const w of warnings) log.warn(`${w.field}: ${w.message}`);

  // 1) RNG
  const seedUsed =
    options.seed !== undefined
      ? parseSeed(options.seed)
      : params.seed ?? seedFromClock((options.now ?? Date.now)());
  const ctx: MapContext = {
    params,
    grid: new TileGrid(params),
    rng: new SeededRandom(seedUsed),
    log,
  };

  // 2) Terrain and climate
  generateElevation(ctx);
  applyClimate(ctx);
  attenuateByOceanDistance(ctx);
  applyOrographicRainfall(ctx);

  // 3) Rivers, then biomes (RNG order: offsets, river draws, biome picks)
  const { network, field } = buildRivers(ctx);
  const unmatchedTiles = classifyBiomes(ctx);

  log.info(`map ${params.width}x${params.height} seed=${seedUsed}: ${network.size} river corners`);

  // 4) Done
  return {
    width: ctx.grid.width,
    height: ctx.grid.height,
    wrapX: ctx.grid.wrapX,
    wrapY: ctx.grid.wrapY,
    tiles: ctx.grid.tiles,
    cornerWidth: network.width,
    cornerHeight: network.height,
    rivers: riverCorners(network, field),
    warnings,
    meta: {
      seedUsed,
      oceanTiles: ctx.grid.tiles.filter((t) => ctx.grid.isOcean(t)).length,
      unmatchedTiles,
      riverCorners: network.size,
    },
  };
}
