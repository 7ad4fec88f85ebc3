import type { Logger } from "./logger.js";
import type { SeededRandom } from "./rng.js";
import type { TileGrid } from "./topology.js";
import type { MapParameters } from "./types.js";

/**
 * Everything one generation run owns. Passed explicitly to every stage;
 * nothing is shared between runs.
 */
export interface MapContext {
  params: MapParameters;
  grid: TileGrid;
  rng: SeededRandom;
  log: Logger;
}
