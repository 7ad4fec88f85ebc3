import { describe, it, expect } from "vitest";
import { windBlowsEast, orographicGain, applyOrographicRainfall } from "./orographic";
import { parseMapParameters, validateParameters } from "./params";
import { TileGrid } from "./topology";
import { SeededRandom } from "./rng";
import { Logger } from "./logger";
import type { MapContext } from "./context";

function mkContext(input: Record<string, unknown>): MapContext {
  const { params } = validateParameters(parseMapParameters(input));
  return { params, grid: new TileGrid(params), rng: new SeededRandom(1), log: Logger.scope("TEST") };
}

// gain reduces to (elevation - previous) / 100 with these settings
const linear = {
  width: 3,
  height: 1,
  tileScale: { x: 100, y: 100 },
  saturationPressureConst1: 0,
  temperatureLapseRate: 0,
  condensationRateMultiplier: 1000,
};

function row(ctx: MapContext, elevations: number[], precipitation: number): void {
  elevations.forEach((e, x) => {
    const t = ctx.grid.at(x, 0);
    t.elevation = e;
    t.precipitation = precipitation;
  });
}

describe("windBlowsEast", () => {
  const params = validateParameters(parseMapParameters({})).params;

  it("blows east between the pressure belts", () => {
    expect(windBlowsEast(45, params)).toBe(true);
    expect(windBlowsEast(-30, params)).toBe(true);
    expect(windBlowsEast(10, params)).toBe(false);
    expect(windBlowsEast(-75, params)).toBe(false);
  });

  it("flips on a west-rotating world", () => {
    const west = { ...params, rotateWest: true };
    expect(windBlowsEast(45, west)).toBe(false);
    expect(windBlowsEast(10, west)).toBe(true);
  });
});

describe("orographicGain", () => {
  it("scales with the climb per metre", () => {
    const params = validateParameters(parseMapParameters(linear)).params;
    expect(orographicGain({ elevation: 300, temperature: 0 }, 100, 0, params, 100)).toBeCloseTo(2, 12);
    expect(orographicGain({ elevation: 100, temperature: 0 }, 300, 0, params, 100)).toBeCloseTo(-2, 12);
  });
});

describe("applyOrographicRainfall", () => {
  // one row at the pole: the wind blows west, so the sweep runs x = 2, 1, 0

  it("starts from the row's last tile when X wraps", () => {
    const ctx = mkContext({ ...linear, wrapX: true });
    row(ctx, [100, -5, 300], 0);
    applyOrographicRainfall(ctx);
    const [x0, x1, x2] = ctx.grid.tiles.map((t) => t.precipitation);
    expect(x0).toBeCloseTo(1, 12);
    expect(x1).toBe(0);
    expect(x2).toBeCloseTo(2, 12);
  });

  it("skips the first tile when X does not wrap", () => {
    const ctx = mkContext({ ...linear, wrapX: false });
    row(ctx, [100, -5, 300], 0);
    applyOrographicRainfall(ctx);
    const [x0, x1, x2] = ctx.grid.tiles.map((t) => t.precipitation);
    expect(x0).toBeCloseTo(1, 12);
    expect(x1).toBe(0);
    expect(x2).toBe(0);
  });

  it("adds on the climb, removes on the descent, leaves ocean alone", () => {
    const ctx = mkContext({ ...linear, wrapX: false });
    row(ctx, [100, 200, -5], 10);
    applyOrographicRainfall(ctx);
    const [x0, x1, x2] = ctx.grid.tiles.map((t) => t.precipitation);
    expect(x1).toBeCloseTo(12, 12);
    expect(x0).toBeCloseTo(9, 12);
    expect(x2).toBe(10);
  });

  it("stays finite when c2 sits right next to the coldest sea-level temperature", () => {
    // pole row T0 = 10 °C and c2 nudged just above -10: the saturation exponent overflows
    const ctx = mkContext({ width: 3, height: 1, wrapX: true, poleTemperature: 10, saturationPressureConst2: -10 });
    row(ctx, [100, 100, 100], 10);
    applyOrographicRainfall(ctx);
    expect(ctx.grid.tiles.map((t) => t.precipitation)).toEqual([10, 10, 10]);

    const steep = mkContext({ width: 3, height: 1, wrapX: true, poleTemperature: 10, saturationPressureConst2: -10 });
    row(steep, [100, 200, 100], 10);
    applyOrographicRainfall(steep);
    expect(steep.grid.tiles.map((t) => t.precipitation)).toEqual([0, Number.MAX_VALUE, 10]);
  });

  it("never drives rainfall below zero", () => {
    const ctx = mkContext({ ...linear, wrapX: false });
    row(ctx, [100, 200, -5], 0.5);
    applyOrographicRainfall(ctx);
    expect(ctx.grid.at(0, 0).precipitation).toBe(0);
  });
});
