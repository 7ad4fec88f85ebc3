import type { GridPoint, Tile, TileId } from "./types.js";
import { seaLevel } from "./constants.js";

/**
 * If coord is within [0, length), return it.
 * Outside that range: coord mod length when wrapping, else null (no neighbour).
 */
export function wrap(coord: number, length: number, wrapEnabled: boolean): number | null {
  if (coord >= 0 && coord < length) return coord;
  if (!wrapEnabled) return null;
  return ((coord % length) + length) % length;
}

/** Separation along one axis, taking the shorter way round when it wraps. */
export function toroidalDelta(a: number, b: number, length: number, wrapEnabled: boolean): number {
  const d = Math.abs(a - b);
  return wrapEnabled ? Math.min(d, length - d) : d;
}

export interface GridShape {
  width: number;
  height: number;
  wrapX: boolean;
  wrapY: boolean;
  tileScale: { x: number; y: number }; // km per tile
}

/**
 * Row-major tile storage plus the wrap-aware lookups every stage shares.
 */
export class TileGrid {
  readonly width: number;
  readonly height: number;
  readonly wrapX: boolean;
  readonly wrapY: boolean;
  readonly tileScale: { x: number; y: number };
  readonly tiles: Tile[];

  constructor(shape: GridShape) {
    this.width = shape.width;
    this.height = shape.height;
    this.wrapX = shape.wrapX;
    this.wrapY = shape.wrapY;
    this.tileScale = { x: shape.tileScale.x, y: shape.tileScale.y };

    this.tiles = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        this.tiles.push({
          id: y * this.width + x,
          x,
          y,
          elevation: 0,
          temperature: 0,
          precipitation: 0,
          nearestOcean: null,
          type: null,
        });
      }
    }
  }

  get size(): number {
    return this.tiles.length;
  }

  index(x: number, y: number): TileId {
    return y * this.width + x;
  }

  at(x: number, y: number): Tile {
    return this.tiles[this.index(x, y)];
  }

  /** Tile at a possibly out-of-range position, or null past a non-wrapping edge */
  wrappedAt(x: number, y: number): Tile | null {
    const wx = wrap(x, this.width, this.wrapX);
    const wy = wrap(y, this.height, this.wrapY);
    if (wx === null || wy === null) return null;
    return this.at(wx, wy);
  }

  /** Up to four distinct neighbours in the order up (+y), down, left, right */
  neighbors4(tile: Tile): Tile[] {
    const out: Tile[] = [];
    const offsets: [number, number][] = [[0, 1], [0, -1], [-1, 0], [1, 0]];
    for (const [dx, dy] of offsets) {
      const nb = this.wrappedAt(tile.x + dx, tile.y + dy);
      // a 1-wide wrapping axis makes a tile its own neighbour
      if (nb && nb.id !== tile.id && !out.includes(nb)) out.push(nb);
    }
    return out;
  }

  /** Squared physical distance in km² between two grid positions */
  distanceSq(a: GridPoint, b: GridPoint): number {
    const dx = toroidalDelta(a.x, b.x, this.width, this.wrapX) * this.tileScale.x;
    const dy = toroidalDelta(a.y, b.y, this.height, this.wrapY) * this.tileScale.y;
    return dx * dx + dy * dy;
  }

  isOcean(tile: Tile): boolean {
    return tile.elevation <= seaLevel;
  }
}
