/**
 * Shared map generation types. Everything here is plain data:
 * renderers and editors consume it without touching the pipeline.
 */

/** Inclusive numeric interval. */
export interface Range {
  min: number;
  max: number;
}

export interface GridPoint {
  x: number;
  y: number;
}

/**
 * A kind of tile and the climate it may be generated in.
 * Each attribute matches if the value falls in any of its ranges.
 */
export interface TileType {
  name: string;
  elevation: Range[];      // metres above sea level
  temperature: Range[];    // °C
  precipitation: Range[];  // mm per year
  /** Opaque reference for the rendering layer; never read by the generator */
  asset?: string;
}

export interface MapParameters {
  // grid
  width: number;
  height: number;
  wrapX: boolean;
  wrapY: boolean;
  tileScale: { x: number; y: number }; // km per tile

  // terrain
  oceanCoverage: number;   // 0..1, portion of tiles at or below sea level
  noiseScale: number;      // 1 => longer map dimension spans one noise unit

  // determinism
  seed?: number;

  // circulation
  highPressureLatitude: number; // degrees
  lowPressureLatitude: number;  // degrees
  rotateWest: boolean;

  // temperature
  equatorTemperature: number;   // °C at sea level
  poleTemperature: number;      // °C at sea level
  temperatureLapseRate: number; // K per metre

  // latitude rainfall
  equatorRainfall: number;
  equatorRainfallEvenness: number;     // degrees
  midLatitudeRainfall: number;
  midLatitudeRainfallEvenness: number; // degrees
  rainfallOceanEFoldingDistance: number; // km

  // orographic rainfall
  condensationRateMultiplier: number;
  saturationPressureConst1: number;
  saturationPressureConst2: number;
  moistureScaleHeightDivisor: number;

  // rivers
  riverRainfallMultiplier: number;
  riverSlopeMultiplier: number;

  tileTypes: TileType[];
}

export type TileId = number;

export interface Tile {
  id: TileId;
  x: number;
  y: number;

  elevation: number;      // metres; <= 0 is ocean
  temperature: number;    // °C, always above absolute zero
  precipitation: number;  // mm/yr, never negative
  nearestOcean: GridPoint | null;  // filled by the ocean distance pass
  type: number | null;    // index into tileTypes; null when nothing matched
}

/** Bit flags for the four links a river corner can have. Up is +y. */
export const Direction = {
  Up: 1,
  Down: 2, // 1 << 1
  Left: 4, // 1 << 2
  Right: 8, // 1 << 3
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export interface RiverCorner {
  x: number;
  y: number;
  connections: number; // OR of Direction flags
  mouth: boolean;       // touches an ocean tile
}

export interface ParameterWarning {
  field: string;
  message: string;
}

/** Outputs from a generation run (compute-only; render elsewhere) */
export interface MapOutputs {
  width: number;
  height: number;
  wrapX: boolean;
  wrapY: boolean;
  tiles: Tile[];            // row-major, index y * width + x
  cornerWidth: number;
  cornerHeight: number;
  rivers: RiverCorner[];    // sparse, ordered by corner index
  warnings: ParameterWarning[];
  meta: {
    seedUsed: number;
    oceanTiles: number;
    unmatchedTiles: number;
    riverCorners: number;
  };
}
