import { describe, it, expect } from "vitest";
import { parseMapParameters, parseSeed, validateParameters } from "./params";
import { MapParameterError } from "./errors";
import { DEFAULT_PARAMETERS } from "./constants";
import { nextUp } from "./math";

const validate = (input: unknown) => validateParameters(parseMapParameters(input));

describe("parseMapParameters", () => {
  it("fills missing fields with the defaults", () => {
    const p = parseMapParameters({ width: 10 });
    expect(p.width).toBe(10);
    expect(p.height).toBe(DEFAULT_PARAMETERS.height);
    expect(p.tileTypes).toHaveLength(DEFAULT_PARAMETERS.tileTypes.length);
  });

  it("treats undefined as an empty object", () => {
    expect(parseMapParameters(undefined).noiseScale).toBe(4);
  });

  it("throws MapParameterError with field paths", () => {
    let caught: unknown = null;
    try {
      parseMapParameters({ width: "wide", tileTypes: [{ name: "x", elevation: [], temperature: [], precipitation: [] }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MapParameterError);
    if (!(caught instanceof MapParameterError)) return;
    const paths = caught.issues.map((i) => i.path);
    expect(paths).toContain("width");
    expect(paths).toContain("tileTypes.0.elevation");
  });

  it("rejects a fractional width", () => {
    expect(() => parseMapParameters({ width: 2.5 })).toThrow(MapParameterError);
  });

  it("accepts only int32 seeds", () => {
    expect(parseMapParameters({ seed: -(2 ** 31) }).seed).toBe(-(2 ** 31));
    expect(parseMapParameters({ seed: 2 ** 31 - 1 }).seed).toBe(2 ** 31 - 1);
    expect(() => parseMapParameters({ seed: 2 ** 32 })).toThrow(MapParameterError);
    expect(() => parseMapParameters({ seed: 0.5 })).toThrow(MapParameterError);
  });
});

describe("parseSeed", () => {
  it("returns a valid seed unchanged", () => {
    expect(parseSeed(0)).toBe(0);
    expect(parseSeed(-7)).toBe(-7);
  });

  it("reports a bad seed under the seed path", () => {
    let caught: unknown = null;
    try {
      parseSeed(1.5);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MapParameterError);
    if (!(caught instanceof MapParameterError)) return;
    expect(caught.issues.map((i) => i.path)).toEqual(["seed"]);
  });
});

describe("validateParameters", () => {
  it("accepts the defaults without warnings", () => {
    expect(validate({}).warnings).toEqual([]);
  });

  it("keeps at least one land tile", () => {
    const { params, warnings } = validate({ width: 2, height: 2, oceanCoverage: 1 });
    expect(params.oceanCoverage).toBe(0.75);
    expect(warnings).toEqual([
      { field: "oceanCoverage", message: "oceanCoverage was clamped from 1 to 0.75." },
    ]);
  });

  it("clamps size and latitudes", () => {
    const { params } = validate({ width: 0, height: -3, highPressureLatitude: 95, lowPressureLatitude: 10 });
    expect(params.width).toBe(1);
    expect(params.height).toBe(1);
    expect(params.highPressureLatitude).toBe(90);
    expect(params.lowPressureLatitude).toBe(90);
  });

  it("moves c2 off the sea-level temperature range", () => {
    const { params, warnings } = validate({ saturationPressureConst2: -10 });
    expect(params.saturationPressureConst2).toBe(nextUp(30));
    expect(warnings.map((w) => w.field)).toEqual(["saturationPressureConst2"]);
  });

  it("raises a zero noise scale", () => {
    const { params, warnings } = validate({ noiseScale: 0 });
    expect(params.noiseScale).toBe(Number.MIN_VALUE);
    expect(warnings.map((w) => w.field)).toEqual(["noiseScale"]);
  });

  it("raises a zero e-folding distance and only warns on a negative one", () => {
    expect(validate({ rainfallOceanEFoldingDistance: 0 }).params.rainfallOceanEFoldingDistance).toBe(Number.MIN_VALUE);
    const neg = validate({ rainfallOceanEFoldingDistance: -5 });
    expect(neg.params.rainfallOceanEFoldingDistance).toBe(-5);
    expect(neg.warnings.map((w) => w.field)).toEqual(["rainfallOceanEFoldingDistance"]);
  });

  it("warns on inverted climate settings without changing them", () => {
    const { params, warnings } = validate({ poleTemperature: 40, temperatureLapseRate: -0.001, condensationRateMultiplier: -1 });
    expect(params.poleTemperature).toBe(40);
    expect(warnings.map((w) => w.field)).toEqual([
      "poleTemperature",
      "temperatureLapseRate",
      "condensationRateMultiplier",
    ]);
  });

  it("floors temperatures at absolute zero and evenness above zero", () => {
    const { params } = validate({ poleTemperature: -500, equatorRainfallEvenness: 0, riverSlopeMultiplier: -2 });
    expect(params.poleTemperature).toBe(nextUp(-273.15));
    expect(params.equatorRainfallEvenness).toBe(Number.MIN_VALUE);
    expect(params.riverSlopeMultiplier).toBe(0);
  });

  it("repairs inverted tile type ranges", () => {
    const { params, warnings } = validate({
      tileTypes: [
        { name: "Odd", elevation: [{ min: 10, max: 5 }], temperature: [{ min: 0, max: 1 }], precipitation: [{ min: 0, max: 1 }] },
      ],
    });
    expect(params.tileTypes[0].elevation).toEqual([{ min: 10, max: 10 }]);
    expect(warnings).toEqual([{ field: "tileTypes.0.elevation.0", message: "Range [10, 5] was adjusted to [10, 10]." }]);
  });

  it("flags tile types that span sea level and maps without land bounds", () => {
    const { warnings } = validate({
      tileTypes: [
        { name: "Shore", elevation: [{ min: -5, max: 5 }], temperature: [{ min: 0, max: 1 }], precipitation: [{ min: 0, max: 1 }] },
        { name: "Deep", elevation: [{ min: -100, max: -1 }], temperature: [{ min: 0, max: 1 }], precipitation: [{ min: 0, max: 1 }] },
      ],
    });
    expect(warnings.map((w) => w.field)).toEqual(["tileTypes.0.elevation"]);

    const none = validate({
      tileTypes: [{ name: "Deep", elevation: [{ min: -100, max: -1 }], temperature: [{ min: 0, max: 1 }], precipitation: [{ min: 0, max: 1 }] }],
    });
    expect(none.warnings.map((w) => w.field)).toEqual(["tileTypes"]);
  });

  it("does not mutate its input", () => {
    const input = parseMapParameters({ width: 0 });
    validateParameters(input);
    expect(input.width).toBe(0);
  });
});
