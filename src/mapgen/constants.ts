import type { MapParameters, TileType } from "./types.js";

/**
 * Physical constants and the default Earth-like parameter set.
 */
export const celsiusToKelvin = 273.15;
export const kmToM = 1000;
export const seaLevel = 0;                 // ocean if elevation <= seaLevel

// Used when no tile type declares a positive elevation bound
export const fallbackMaxElevation = 1;

// Stays below the smallest raw noise value when the ocean quantile is empty
export const emptyOceanQuantileGap = 1e-9;

const ANY: { min: number; max: number } = { min: -Number.MAX_VALUE, max: Number.MAX_VALUE };

export const defaultTileTypes: TileType[] = [
  {
    name: "Ocean",
    elevation: [{ min: -Number.MAX_VALUE, max: 0 }],
    temperature: [{ min: -2, max: Number.MAX_VALUE }],
    precipitation: [ANY],
  },
  {
    name: "Sea Ice",
    elevation: [{ min: -Number.MAX_VALUE, max: 0 }],
    temperature: [{ min: -Number.MAX_VALUE, max: -2 }],
    precipitation: [ANY],
  },
  {
    name: "Ice Sheet",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: -Number.MAX_VALUE, max: -10 }],
    precipitation: [ANY],
  },
  {
    name: "Tundra",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: -10, max: 0 }],
    precipitation: [ANY],
  },
  {
    name: "Desert",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: 0, max: Number.MAX_VALUE }],
    precipitation: [{ min: 0, max: 250 }],
  },
  {
    name: "Grassland",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: 0, max: Number.MAX_VALUE }],
    precipitation: [{ min: 250, max: 750 }],
  },
  {
    name: "Forest",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: 0, max: 20 }],
    precipitation: [{ min: 750, max: Number.MAX_VALUE }],
  },
  {
    name: "Rainforest",
    elevation: [{ min: Number.MIN_VALUE, max: 9000 }],
    temperature: [{ min: 20, max: Number.MAX_VALUE }],
    precipitation: [{ min: 750, max: Number.MAX_VALUE }],
  },
];

export const DEFAULT_PARAMETERS: MapParameters = {
  width: 128,
  height: 64,
  wrapX: true,
  wrapY: false,
  tileScale: { x: 150, y: 150 },
  oceanCoverage: 0.7,
  noiseScale: 4,
  highPressureLatitude: 30,
  lowPressureLatitude: 60,
  rotateWest: false,
  equatorTemperature: 30,
  poleTemperature: -30,
  temperatureLapseRate: 0.0065,
  equatorRainfall: 2000,
  equatorRainfallEvenness: 10,
  midLatitudeRainfall: 1000,
  midLatitudeRainfallEvenness: 15,
  rainfallOceanEFoldingDistance: 1000,
  condensationRateMultiplier: 30000,
  saturationPressureConst1: 17.67,
  saturationPressureConst2: 243.5,
  moistureScaleHeightDivisor: 5420,
  riverRainfallMultiplier: 0.002,
  riverSlopeMultiplier: 50,
  tileTypes: defaultTileTypes,
};
