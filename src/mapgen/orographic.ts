import type { MapContext } from "./context.js";
import { latitude, seaLevelTemperature } from "./climate.js";
import { celsiusToKelvin, kmToM } from "./constants.js";
import { clamp } from "./math.js";
import type { MapParameters, Tile } from "./types.js";

/**
 * Prevailing wind for a latitude (degrees). Between the high and low
 * pressure belts the wind blows east (towards +x); elsewhere west.
 * A west-rotating world swaps the two.
 */
export function windBlowsEast(latDeg: number, params: MapParameters): boolean {
  const a = Math.abs(latDeg);
  const westerlies = a >= params.highPressureLatitude && a <= params.lowPressureLatitude;
  return params.rotateWest ? !westerlies : westerlies;
}

/**
 * Rain gained (or lost, when negative) as air climbs from `prevElevation`
 * to the tile's elevation. May be ±Infinity when c2 sits right next to
 * -T0; never NaN.
 */
export function orographicGain(
  tile: Pick<Tile, "elevation" | "temperature">,
  prevElevation: number,
  seaLevelTemp: number,
  params: MapParameters,
  tileScaleX: number
): number {
  const kelvin = tile.temperature + celsiusToKelvin;
  const saturation =
    (params.saturationPressureConst1 * seaLevelTemp) / (params.saturationPressureConst2 + seaLevelTemp);
  const moisture =
    (tile.elevation * params.moistureScaleHeightDivisor * params.temperatureLapseRate) / (kelvin * kelvin);

  const gain =
    params.condensationRateMultiplier *
    Math.exp(saturation - moisture) *
    ((tile.elevation - prevElevation) / (tileScaleX * kmToM));
  // an overflowed exp times a flat step (or a zero multiplier) is no gain
  return Number.isNaN(gain) ? 0 : gain;
}

/**
 * Sweep each row downwind, adding orographic rain to land tiles.
 * The first tile of a row has no upwind tile unless the map wraps on X,
 * in which case the row's last tile (in sweep order) stands in.
 */
export function applyOrographicRainfall(ctx: MapContext): void {
  const { params, grid, log } = ctx;
  const landElevation = (t: Tile): number => (t.elevation > 0 ? t.elevation : 0);

  let eastRows = 0;
  for (let y = 0; y < grid.height; y++) {
    const lat = latitude(y, grid.height);
    const t0 = seaLevelTemperature(lat, params);
    const east = windBlowsEast((lat * 180) / Math.PI, params);
    if (east) eastRows++;

    const row: Tile[] = [];
    for (let x = 0; x < grid.width; x++) row.push(grid.at(x, y));
    if (!east) row.reverse();

    let prev: number | null = grid.wrapX ? landElevation(row[row.length - 1]) : null;
    for (const tile of row) {
      if (tile.elevation > 0 && prev !== null) {
        const gain = orographicGain(tile, prev, t0, params, grid.tileScale.x);
        tile.precipitation = clamp(tile.precipitation + gain, 0, Number.MAX_VALUE);
      }
      prev = landElevation(tile);
    }
  }

  log.debug(`orographic: ${eastRows} eastward rows, ${grid.height - eastRows} westward`);
}
