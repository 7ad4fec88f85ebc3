import type { MapContext } from "./context.js";
import { clamp, degToRad, minTemperature } from "./math.js";
import type { MapParameters } from "./types.js";

/** Latitude in radians of row y: -π/2 at y = 0, 0 at the middle row. */
export function latitude(y: number, height: number): number {
  return (y / height - 0.5) * Math.PI;
}

export function seaLevelTemperature(lat: number, params: MapParameters): number {
  const s = Math.sin(lat);
  return params.equatorTemperature - (params.equatorTemperature - params.poleTemperature) * s * s;
}

/**
 * Sea-level temperature lowered by the lapse rate on land only;
 * ocean tiles keep the sea-level value whatever their depth.
 */
export function tileTemperature(lat: number, elevation: number, params: MapParameters): number {
  let t = seaLevelTemperature(lat, params);
  if (elevation > 0) t -= elevation * params.temperatureLapseRate;
  return clamp(t, minTemperature, Infinity);
}

/**
 * Latitude rainfall: one peak on the equator and one at each
 * ±lowPressureLatitude, each falling off as 1 / (1 + (Δ/evenness)²).
 */
export function baselineRainfall(lat: number, params: MapParameters): number {
  const peak = (center: number, amount: number, evenness: number): number => {
    const d = (lat - center) / Math.max(evenness, Number.MIN_VALUE);
    return amount / (1 + d * d);
  };

  const lowP = degToRad(params.lowPressureLatitude);
  const midEven = degToRad(params.midLatitudeRainfallEvenness);
  return (
    peak(0, params.equatorRainfall, degToRad(params.equatorRainfallEvenness)) +
    peak(lowP, params.midLatitudeRainfall, midEven) +
    peak(-lowP, params.midLatitudeRainfall, midEven)
  );
}

/** Writes temperature and latitude rainfall for every tile. */
export function applyClimate(ctx: MapContext): void {
  const { params, grid, log } = ctx;

  for (let y = 0; y < grid.height; y++) {
    const lat = latitude(y, grid.height);
    const rain = Math.max(0, baselineRainfall(lat, params));
    for (let x = 0; x < grid.width; x++) {
      const tile = grid.at(x, y);
      tile.temperature = tileTemperature(lat, tile.elevation, params);
      tile.precipitation = rain;
    }
  }

  log.debug(`climate: temperature and latitude rainfall for ${grid.size} tiles`);
}
