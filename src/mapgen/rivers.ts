import type { MapContext } from "./context.js";
import { kmToM } from "./constants.js";
import { wrap, type TileGrid } from "./topology.js";
import { Direction, type GridPoint, type MapParameters, type RiverCorner } from "./types.js";

export type CornerId = number;

const STEPS: [Direction, number, number][] = [
  [Direction.Up, 0, 1],
  [Direction.Down, 0, -1],
  [Direction.Left, -1, 0],
  [Direction.Right, 1, 0],
];

export function opposite(dir: Direction): Direction {
  switch (dir) {
    case Direction.Up: return Direction.Down;
    case Direction.Down: return Direction.Up;
    case Direction.Left: return Direction.Right;
    case Direction.Right: return Direction.Left;
  }
}

/**
 * Sparse river overlay on the corner (dual) grid. Corner (cx, cy) sits
 * between tiles x ∈ {cx-1, cx} and y ∈ {cy-1, cy}. A wrapping axis has as
 * many corners as tiles (the last corner is the first); otherwise one more.
 *
 * Links are always stored on both ends.
 */
export class RiverNetwork {
  readonly width: number;
  readonly height: number;
  private readonly masks = new Map<CornerId, number>();

  constructor(
    readonly gridWidth: number,
    readonly gridHeight: number,
    readonly wrapX: boolean,
    readonly wrapY: boolean
  ) {
    this.width = wrapX ? gridWidth : gridWidth + 1;
    this.height = wrapY ? gridHeight : gridHeight + 1;
  }

  get size(): number {
    return this.masks.size;
  }

  index(cx: number, cy: number): CornerId {
    return cy * this.width + cx;
  }

  point(id: CornerId): GridPoint {
    return { x: id % this.width, y: Math.floor(id / this.width) };
  }

  has(id: CornerId): boolean {
    return this.masks.has(id);
  }

  connections(id: CornerId): number {
    return this.masks.get(id) ?? 0;
  }

  /** Mark a corner as carrying a river, with no links yet */
  add(id: CornerId): void {
    if (!this.masks.has(id)) this.masks.set(id, 0);
  }

  /** Link `from` towards `to` in direction `dir`, and `to` back towards `from` */
  link(from: CornerId, to: CornerId, dir: Direction): void {
    this.masks.set(from, this.connections(from) | dir);
    this.masks.set(to, this.connections(to) | opposite(dir));
  }

  /** Neighbouring corner one step in `dir`, or null past a non-wrapping edge */
  neighbor(id: CornerId, dir: Direction): CornerId | null {
    const step = STEPS.find(([d]) => d === dir);
    if (!step) return null;
    const { x, y } = this.point(id);
    const nx = wrap(x + step[1], this.width, this.wrapX);
    const ny = wrap(y + step[2], this.height, this.wrapY);
    if (nx === null || ny === null) return null;
    return this.index(nx, ny);
  }

  /**
   * Positions a renderer should draw this corner at. A corner on a wrapped
   * edge also appears on the opposite edge: up to four positions.
   */
  physicalPositions(id: CornerId): GridPoint[] {
    const { x, y } = this.point(id);
    const xs = this.wrapX && x === 0 ? [0, this.gridWidth] : [x];
    const ys = this.wrapY && y === 0 ? [0, this.gridHeight] : [y];
    const out: GridPoint[] = [];
    for (const py of ys) for (const px of xs) out.push({ x: px, y: py });
    return out;
  }

  /** Corner ids carrying a river, ascending */
  ids(): CornerId[] {
    return Array.from(this.masks.keys()).sort((a, b) => a - b);
  }
}

export type RiverShape = "isolated" | "end" | "bend" | "straight" | "tee" | "cross";

/** Classify a connection mask by how many links it has and how they sit. */
export function riverShape(mask: number): RiverShape {
  let links = 0;
  for (const [d] of STEPS) if (mask & d) links++;
  switch (links) {
    case 0: return "isolated";
    case 1: return "end";
    case 3: return "tee";
    case 4: return "cross";
  }
  const vertical = Direction.Up | Direction.Down;
  const horizontal = Direction.Left | Direction.Right;
  return (mask & vertical) === vertical || (mask & horizontal) === horizontal ? "straight" : "bend";
}

/** Per-corner averages of the surrounding tiles. */
export interface CornerField {
  elevation: Float64Array;
  precipitation: Float64Array;
  touchesOcean: Uint8Array;
}

export function sampleCorners(grid: TileGrid, net: RiverNetwork): CornerField {
  const n = net.width * net.height;
  const field: CornerField = {
    elevation: new Float64Array(n),
    precipitation: new Float64Array(n),
    touchesOcean: new Uint8Array(n),
  };

  for (let cy = 0; cy < net.height; cy++) {
    for (let cx = 0; cx < net.width; cx++) {
      const id = net.index(cx, cy);
      const seen = new Set<number>();
      let elevation = 0, precipitation = 0;

      for (const [dx, dy] of [[-1, -1], [0, -1], [-1, 0], [0, 0]]) {
        const tile = grid.wrappedAt(cx + dx, cy + dy);
        if (!tile || seen.has(tile.id)) continue;
        seen.add(tile.id);
        elevation += tile.elevation;
        precipitation += tile.precipitation;
        if (grid.isOcean(tile)) field.touchesOcean[id] = 1;
      }

      field.elevation[id] = elevation / seen.size;
      field.precipitation[id] = precipitation / seen.size;
    }
  }
  return field;
}

export interface Descent {
  to: CornerId;
  dir: Direction;
  slope: number; // metres of drop per metre travelled
}

/** Steepest strictly downhill neighbouring corner, or null at a low point. */
export function steepestDescent(
  id: CornerId,
  net: RiverNetwork,
  field: CornerField,
  tileScale: { x: number; y: number }
): Descent | null {
  let best: Descent | null = null;
  for (const [dir, dx] of STEPS) {
    const nb = net.neighbor(id, dir);
    if (nb === null) continue;
    const spacing = (dx !== 0 ? tileScale.x : tileScale.y) * kmToM;
    const slope = (field.elevation[id] - field.elevation[nb]) / spacing;
    if (slope > (best?.slope ?? 0)) best = { to: nb, dir, slope };
  }
  return best;
}

/** Chance that a river rises at a corner: (4/π²)·atan(k₁·rain)·atan(k₂·slope), in [0, 1). */
export function riverProbability(precipitation: number, slope: number, params: MapParameters): number {
  return (
    (4 / (Math.PI * Math.PI)) *
    Math.atan(params.riverRainfallMultiplier * precipitation) *
    Math.atan(params.riverSlopeMultiplier * slope)
  );
}

/**
 * Follow steepest descent from `start` until the river reaches the coast,
 * a low point, or joins an existing river. Returns the number of links made.
 */
export function walkRiver(
  start: CornerId,
  net: RiverNetwork,
  field: CornerField,
  tileScale: { x: number; y: number }
): number {
  net.add(start);
  let links = 0;
  let current = start;

  while (!field.touchesOcean[current]) {
    const down = steepestDescent(current, net, field, tileScale);
    if (!down) break;

    const joins = net.has(down.to);
    net.link(current, down.to, down.dir);
    links++;
    if (joins) break;
    current = down.to;
  }
  return links;
}

export interface RiverBuild {
  network: RiverNetwork;
  field: CornerField;
  sources: number;
}

/**
 * Seed rivers corner by corner (row-major, one Bernoulli draw per dry
 * inland corner without a river) and walk each one downhill.
 */
export function buildRivers(ctx: MapContext): RiverBuild {
  const { params, grid, rng, log } = ctx;
  const net = new RiverNetwork(grid.width, grid.height, grid.wrapX, grid.wrapY);
  const field = sampleCorners(grid, net);

  let sources = 0;
  let links = 0;
  for (let cy = 0; cy < net.height; cy++) {
    for (let cx = 0; cx < net.width; cx++) {
      const id = net.index(cx, cy);
      if (net.has(id) || field.touchesOcean[id]) continue;

      const slope = steepestDescent(id, net, field, grid.tileScale)?.slope ?? 0;
      const p = riverProbability(field.precipitation[id], slope, params);
      if (!rng.chance(p)) continue;

      sources++;
      links += walkRiver(id, net, field, grid.tileScale);
    }
  }

  log.debug(`rivers: ${sources} sources, ${links} links over ${net.size} corners`);
  return { network: net, field, sources };
}

/** Plain-data view of the network, ordered by corner index. */
export function riverCorners(net: RiverNetwork, field: CornerField): RiverCorner[] {
  return net.ids().map((id) => ({
    ...net.point(id),
    connections: net.connections(id),
    mouth: field.touchesOcean[id] === 1,
  }));
}
