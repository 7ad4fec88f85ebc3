import { z } from "zod";
import { DEFAULT_PARAMETERS } from "./constants.js";
import { MapParameterError } from "./errors.js";
import { clamp, minTemperature, nextUp } from "./math.js";
import type { MapParameters, ParameterWarning, Range, TileType } from "./types.js";

const D = DEFAULT_PARAMETERS;

const rangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});

const tileTypeSchema = z.object({
  name: z.string(),
  elevation: z.array(rangeSchema).min(1),
  temperature: z.array(rangeSchema).min(1),
  precipitation: z.array(rangeSchema).min(1),
  asset: z.string().optional(),
});

/** Seeds are int32: the generator state is 32 bits wide. */
export const seedSchema = z.number().int().min(-(2 ** 31)).max(2 ** 31 - 1);

/**
 * Shape of a parameter object. Missing fields fall back to the defaults;
 * values are range-checked separately by validateParameters().
 */
export const mapParametersSchema = z.object({
  width: z.number().int().default(D.width),
  height: z.number().int().default(D.height),
  wrapX: z.boolean().default(D.wrapX),
  wrapY: z.boolean().default(D.wrapY),
  tileScale: z.object({ x: z.number(), y: z.number() }).default(D.tileScale),
  oceanCoverage: z.number().default(D.oceanCoverage),
  noiseScale: z.number().finite().default(D.noiseScale),
  seed: seedSchema.optional(),
  highPressureLatitude: z.number().default(D.highPressureLatitude),
  lowPressureLatitude: z.number().default(D.lowPressureLatitude),
  rotateWest: z.boolean().default(D.rotateWest),
  equatorTemperature: z.number().default(D.equatorTemperature),
  poleTemperature: z.number().default(D.poleTemperature),
  temperatureLapseRate: z.number().default(D.temperatureLapseRate),
  equatorRainfall: z.number().default(D.equatorRainfall),
  equatorRainfallEvenness: z.number().default(D.equatorRainfallEvenness),
  midLatitudeRainfall: z.number().default(D.midLatitudeRainfall),
  midLatitudeRainfallEvenness: z.number().default(D.midLatitudeRainfallEvenness),
  rainfallOceanEFoldingDistance: z.number().default(D.rainfallOceanEFoldingDistance),
  condensationRateMultiplier: z.number().default(D.condensationRateMultiplier),
  saturationPressureConst1: z.number().default(D.saturationPressureConst1),
  saturationPressureConst2: z.number().default(D.saturationPressureConst2),
  moistureScaleHeightDivisor: z.number().default(D.moistureScaleHeightDivisor),
  riverRainfallMultiplier: z.number().default(D.riverRainfallMultiplier),
  riverSlopeMultiplier: z.number().default(D.riverSlopeMultiplier),
  tileTypes: z.array(tileTypeSchema).default(D.tileTypes),
});

export type MapParametersInput = z.input<typeof mapParametersSchema>;

function parameterError(title: string, error: z.ZodError, prefix: string[] = []): MapParameterError {
  const issues = error.issues.map((i) => ({
    path: [...prefix, ...i.path].join("."),
    message: i.message,
  }));
  const summary = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
  return new MapParameterError(`${title}: ${summary}`, issues);
}

/** Parse untrusted input into a full parameter object, or throw MapParameterError. */
export function parseMapParameters(input: unknown): MapParameters {
  const result = mapParametersSchema.safeParse(input ?? {});
  if (!result.success) throw parameterError("Invalid map parameters", result.error);
  return result.data;
}

/** Check a seed given outside the parameter object. */
export function parseSeed(value: unknown): number {
  const result = seedSchema.safeParse(value);
  if (!result.success) throw parameterError("Invalid seed", result.error, ["seed"]);
  return result.data;
}

export interface ValidationResult {
  params: MapParameters;
  warnings: ParameterWarning[];
}

/**
 * Restrict parameters to values the generator can run on.
 * Returns a clamped copy plus a warning for every adjusted field and for
 * settings that run but invert real-world behaviour.
 */
export function validateParameters(input: MapParameters): ValidationResult {
  const warnings: ParameterWarning[] = [];
  const warn = (field: string, message: string) => warnings.push({ field, message });

  const clamped = (field: string, value: number, lo: number, hi: number): number => {
    const v = clamp(value, lo, hi);
    if (v !== value) warn(field, `${field} was clamped from ${value} to ${v}.`);
    return v;
  };

  const p: MapParameters = {
    ...input,
    tileScale: { ...input.tileScale },
    tileTypes: input.tileTypes.map((t) => ({ ...t })),
  };

  // Map size must be positive
  p.width = clamped("width", p.width, 1, Number.MAX_SAFE_INTEGER);
  p.height = clamped("height", p.height, 1, Number.MAX_SAFE_INTEGER);

  // Tile scale must be positive and the total extent finite
  p.tileScale.x = clamped("tileScale.x", p.tileScale.x, Number.MIN_VALUE, Number.MAX_VALUE / p.width);
  p.tileScale.y = clamped("tileScale.y", p.tileScale.y, Number.MIN_VALUE, Number.MAX_VALUE / p.height);

  // A zero scale samples one noise value for the whole map
  if (p.noiseScale === 0) {
    p.noiseScale = Number.MIN_VALUE;
    warn("noiseScale", "Noise scale of 0 was raised to the smallest positive value; the map will be flat.");
  }

  // At least one tile stays land
  p.oceanCoverage = clamped("oceanCoverage", p.oceanCoverage, 0, 1 - 1 / (p.width * p.height));

  p.tileTypes = p.tileTypes.map((t, i) => validateTileType(t, `tileTypes.${i}`, warn));

  p.highPressureLatitude = clamped("highPressureLatitude", p.highPressureLatitude, 0, 90);
  p.lowPressureLatitude = clamped("lowPressureLatitude", p.lowPressureLatitude, p.highPressureLatitude, 90);

  p.equatorTemperature = clamped("equatorTemperature", p.equatorTemperature, minTemperature, Number.MAX_VALUE);
  p.poleTemperature = clamped("poleTemperature", p.poleTemperature, minTemperature, Number.MAX_VALUE);
  if (p.poleTemperature > p.equatorTemperature) {
    warn("poleTemperature", "Pole temperature is greater than equator temperature.");
  }
  if (p.temperatureLapseRate < 0) {
    warn(
      "temperatureLapseRate",
      "Temperature lapse rate is negative; temperature will rise with elevation."
    );
  }

  p.equatorRainfall = clamped("equatorRainfall", p.equatorRainfall, 0, Infinity);
  p.midLatitudeRainfall = clamped("midLatitudeRainfall", p.midLatitudeRainfall, 0, Infinity);
  // Squared in the rainfall formula, so only zero needs excluding
  p.equatorRainfallEvenness = clamped("equatorRainfallEvenness", p.equatorRainfallEvenness, Number.MIN_VALUE, Infinity);
  p.midLatitudeRainfallEvenness = clamped(
    "midLatitudeRainfallEvenness", p.midLatitudeRainfallEvenness, Number.MIN_VALUE, Infinity
  );

  if (p.rainfallOceanEFoldingDistance === 0) {
    p.rainfallOceanEFoldingDistance = Number.MIN_VALUE;
    warn("rainfallOceanEFoldingDistance", "Ocean e-folding distance of 0 was raised to the smallest positive value.");
  } else if (p.rainfallOceanEFoldingDistance < 0) {
    warn(
      "rainfallOceanEFoldingDistance",
      "Ocean e-folding distance is negative; precipitation will grow with distance from the ocean."
    );
  }

  if (p.condensationRateMultiplier < 0) {
    warn(
      "condensationRateMultiplier",
      "Condensation rate multiplier is negative; orographic precipitation will be inverted."
    );
  }

  // c2 + T is a divisor for every sea-level temperature between pole and equator
  const lowT = Math.min(p.equatorTemperature, p.poleTemperature);
  const highT = Math.max(p.equatorTemperature, p.poleTemperature);
  if (-p.saturationPressureConst2 >= lowT && -p.saturationPressureConst2 <= highT) {
    const nudged = nextUp(-lowT);
    warn(
      "saturationPressureConst2",
      `saturationPressureConst2 was moved from ${p.saturationPressureConst2} to ${nudged} to keep c2 + T non-zero.`
    );
    p.saturationPressureConst2 = nudged;
  }

  p.riverRainfallMultiplier = clamped("riverRainfallMultiplier", p.riverRainfallMultiplier, 0, Infinity);
  p.riverSlopeMultiplier = clamped("riverSlopeMultiplier", p.riverSlopeMultiplier, 0, Infinity);

  const hasLandBound = p.tileTypes.some((t) => t.elevation.some((r) => r.max > 0));
  if (!hasLandBound) {
    warn("tileTypes", "No tile type allows a positive elevation; land will only reach 1 m.");
  }

  return { params: p, warnings };
}

function validateTileType(
  type: TileType,
  field: string,
  warn: (field: string, message: string) => void
): TileType {
  const fixRanges = (ranges: Range[], name: string, hi: number): Range[] =>
    ranges.map((r, i) => {
      const min = clamp(r.min, -Infinity, hi);
      const max = clamp(r.max, min, hi);
      if (min !== r.min || max !== r.max) {
        warn(`${field}.${name}.${i}`, `Range [${r.min}, ${r.max}] was adjusted to [${min}, ${max}].`);
      }
      return { min, max };
    });

  // The highest elevation bound sets the land scale, so it must be finite
  const out: TileType = {
    ...type,
    elevation: fixRanges(type.elevation, "elevation", Number.MAX_VALUE),
    temperature: fixRanges(type.temperature, "temperature", Infinity),
    precipitation: fixRanges(type.precipitation, "precipitation", Infinity),
  };

  if (out.elevation.some((r) => r.min < 0 && r.max > 0)) {
    warn(
      `${field}.elevation`,
      `Tile type "${out.name}" spans both positive and negative elevations; land and ocean tiles may share it.`
    );
  }
  return out;
}
