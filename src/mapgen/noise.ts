import permutation from "./data/permutation.json";

/**
 * Simplex noise in 2, 3 and 4 dimensions, after Stefan Gustavson's
 * reference implementation. Outputs are biased to sit near [0, 1].
 *
 * The permutation table is fixed; callers vary the sampled region by
 * translating their coordinates.
 */

type Vec3 = [number, number, number];
type Vec4 = [number, number, number, number];

const grad3: Vec3[] = [
  [1, 1, 0], [-1, 1, 0], [1, -1, 0], [-1, -1, 0],
  [1, 0, 1], [-1, 0, 1], [1, 0, -1], [-1, 0, -1],
  [0, 1, 1], [0, -1, 1], [0, 1, -1], [0, -1, -1],
];

const grad4: Vec4[] = [
  [0, 1, 1, 1], [0, 1, 1, -1], [0, 1, -1, 1], [0, 1, -1, -1],
  [0, -1, 1, 1], [0, -1, 1, -1], [0, -1, -1, 1], [0, -1, -1, -1],
  [1, 0, 1, 1], [1, 0, 1, -1], [1, 0, -1, 1], [1, 0, -1, -1],
  [-1, 0, 1, 1], [-1, 0, 1, -1], [-1, 0, -1, 1], [-1, 0, -1, -1],
  [1, 1, 0, 1], [1, 1, 0, -1], [1, -1, 0, 1], [1, -1, 0, -1],
  [-1, 1, 0, 1], [-1, 1, 0, -1], [-1, -1, 0, 1], [-1, -1, 0, -1],
  [1, 1, 1, 0], [1, 1, -1, 0], [1, -1, 1, 0], [1, -1, -1, 0],
  [-1, 1, 1, 0], [-1, 1, -1, 0], [-1, -1, 1, 0], [-1, -1, -1, 0],
];

// Doubled so lookups never need wrapping
const perm = new Uint8Array(512);
for (let i = 0; i < 512; i++) perm[i] = permutation[i & 255];

const F2 = 0.5 * (Math.sqrt(3) - 1);
const G2 = (3 - Math.sqrt(3)) / 6;
const F3 = 1 / 3;
const G3 = 1 / 6;
const F4 = (Math.sqrt(5) - 1) / 4;
const G4 = (5 - Math.sqrt(5)) / 20;

/**
 * 4D traversal table. The index packs six pairwise comparisons
 * (x>y, x>z, y>z, x>w, y>w, z>w as bits 32..1); each entry holds the
 * magnitude rank of x, y, z, w. Only 24 of the 64 indices describe a
 * consistent ordering; the rest stay zero.
 */
export const simplex4: readonly Vec4[] = buildSimplex4();

function buildSimplex4(): Vec4[] {
  const table: Vec4[] = [];
  for (let c = 0; c < 64; c++) {
    const xy = (c >> 5) & 1, xz = (c >> 4) & 1, yz = (c >> 3) & 1;
    const xw = (c >> 2) & 1, yw = (c >> 1) & 1, zw = c & 1;
    const ranks: Vec4 = [
      xy + xz + xw,
      (1 - xy) + yz + yw,
      (1 - xz) + (1 - yz) + zw,
      (1 - xw) + (1 - yw) + (1 - zw),
    ];
    const isOrdering = new Set(ranks).size === 4;
    table.push(isOrdering ? ranks : [0, 0, 0, 0]);
  }
  return table;
}

function corner2(gi: number, x: number, y: number): number {
  let t = 0.5 - x * x - y * y;
  if (t < 0) return 0;
  t *= t;
  const g = grad3[gi];
  return t * t * (g[0] * x + g[1] * y);
}

function corner3(gi: number, x: number, y: number, z: number): number {
  let t = 0.6 - x * x - y * y - z * z;
  if (t < 0) return 0;
  t *= t;
  const g = grad3[gi];
  return t * t * (g[0] * x + g[1] * y + g[2] * z);
}

function corner4(gi: number, x: number, y: number, z: number, w: number): number {
  let t = 0.6 - x * x - y * y - z * z - w * w;
  if (t < 0) return 0;
  t *= t;
  const g = grad4[gi];
  return t * t * (g[0] * x + g[1] * y + g[2] * z + g[3] * w);
}

export function noise2D(x: number, y: number): number {
  // Skew to find the simplex cell, then unskew its origin
  const s = (x + y) * F2;
  const i = Math.floor(x + s);
  const j = Math.floor(y + s);
  const t = (i + j) * G2;
  const x0 = x - (i - t);
  const y0 = y - (j - t);

  // Lower triangle (1,0) or upper triangle (0,1)
  const i1 = x0 > y0 ? 1 : 0;
  const j1 = 1 - i1;

  const x1 = x0 - i1 + G2;
  const y1 = y0 - j1 + G2;
  const x2 = x0 - 1 + 2 * G2;
  const y2 = y0 - 1 + 2 * G2;

  const ii = i & 255;
  const jj = j & 255;
  const n =
    corner2(perm[ii + perm[jj]] % 12, x0, y0) +
    corner2(perm[ii + i1 + perm[jj + j1]] % 12, x1, y1) +
    corner2(perm[ii + 1 + perm[jj + 1]] % 12, x2, y2);

  return 35 * n + 0.5;
}

export function noise3D(x: number, y: number, z: number): number {
  const s = (x + y + z) * F3;
  const i = Math.floor(x + s);
  const j = Math.floor(y + s);
  const k = Math.floor(z + s);
  const t = (i + j + k) * G3;
  const x0 = x - (i - t);
  const y0 = y - (j - t);
  const z0 = z - (k - t);

  // Second (i1,j1,k1) and third (i2,j2,k2) corner offsets
  let i1: number, j1: number, k1: number;
  let i2: number, j2: number, k2: number;
  if (x0 >= y0) {
    if (y0 >= z0) {
      [i1, j1, k1, i2, j2, k2] = [1, 0, 0, 1, 1, 0]; // X Y Z
    } else if (x0 >= z0) {
      [i1, j1, k1, i2, j2, k2] = [1, 0, 0, 1, 0, 1]; // X Z Y
    } else {
      [i1, j1, k1, i2, j2, k2] = [0, 0, 1, 1, 0, 1]; // Z X Y
    }
  } else if (y0 < z0) {
    [i1, j1, k1, i2, j2, k2] = [0, 0, 1, 0, 1, 1];   // Z Y X
  } else if (x0 < z0) {
    [i1, j1, k1, i2, j2, k2] = [0, 1, 0, 0, 1, 1];   // Y Z X
  } else {
    [i1, j1, k1, i2, j2, k2] = [0, 1, 0, 1, 1, 0];   // Y X Z
  }

  const x1 = x0 - i1 + G3, y1 = y0 - j1 + G3, z1 = z0 - k1 + G3;
  const x2 = x0 - i2 + 2 * G3, y2 = y0 - j2 + 2 * G3, z2 = z0 - k2 + 2 * G3;
  const x3 = x0 - 1 + 3 * G3, y3 = y0 - 1 + 3 * G3, z3 = z0 - 1 + 3 * G3;

  const ii = i & 255;
  const jj = j & 255;
  const kk = k & 255;
  const n =
    corner3(perm[ii + perm[jj + perm[kk]]] % 12, x0, y0, z0) +
    corner3(perm[ii + i1 + perm[jj + j1 + perm[kk + k1]]] % 12, x1, y1, z1) +
    corner3(perm[ii + i2 + perm[jj + j2 + perm[kk + k2]]] % 12, x2, y2, z2) +
    corner3(perm[ii + 1 + perm[jj + 1 + perm[kk + 1]]] % 12, x3, y3, z3);

  return 16 * n + 0.5;
}

export function noise4D(x: number, y: number, z: number, w: number): number {
  const s = (x + y + z + w) * F4;
  const i = Math.floor(x + s);
  const j = Math.floor(y + s);
  const k = Math.floor(z + s);
  const l = Math.floor(w + s);
  const t = (i + j + k + l) * G4;
  const x0 = x - (i - t);
  const y0 = y - (j - t);
  const z0 = z - (k - t);
  const w0 = w - (l - t);

  let c = 0;
  if (x0 > y0) c += 32;
  if (x0 > z0) c += 16;
  if (y0 > z0) c += 8;
  if (x0 > w0) c += 4;
  if (y0 > w0) c += 2;
  if (z0 > w0) c += 1;
  const [rx, ry, rz, rw] = simplex4[c];

  // Step along the largest coordinate first, then the next largest, ...
  const off = (rank: number, step: number): number => (rank >= 4 - step ? 1 : 0);
  const i1 = off(rx, 1), j1 = off(ry, 1), k1 = off(rz, 1), l1 = off(rw, 1);
  const i2 = off(rx, 2), j2 = off(ry, 2), k2 = off(rz, 2), l2 = off(rw, 2);
  const i3 = off(rx, 3), j3 = off(ry, 3), k3 = off(rz, 3), l3 = off(rw, 3);

  const x1 = x0 - i1 + G4, y1 = y0 - j1 + G4, z1 = z0 - k1 + G4, w1 = w0 - l1 + G4;
  const x2 = x0 - i2 + 2 * G4, y2 = y0 - j2 + 2 * G4, z2 = z0 - k2 + 2 * G4, w2 = w0 - l2 + 2 * G4;
  const x3 = x0 - i3 + 3 * G4, y3 = y0 - j3 + 3 * G4, z3 = z0 - k3 + 3 * G4, w3 = w0 - l3 + 3 * G4;
  const x4 = x0 - 1 + 4 * G4, y4 = y0 - 1 + 4 * G4, z4 = z0 - 1 + 4 * G4, w4 = w0 - 1 + 4 * G4;

  const ii = i & 255;
  const jj = j & 255;
  const kk = k & 255;
  const ll = l & 255;
  const gi = (a: number, b: number, d: number, e: number): number =>
    perm[ii + a + perm[jj + b + perm[kk + d + perm[ll + e]]]] % 32;

  const n =
    corner4(gi(0, 0, 0, 0), x0, y0, z0, w0) +
    corner4(gi(i1, j1, k1, l1), x1, y1, z1, w1) +
    corner4(gi(i2, j2, k2, l2), x2, y2, z2, w2) +
    corner4(gi(i3, j3, k3, l3), x3, y3, z3, w3) +
    corner4(gi(1, 1, 1, 1), x4, y4, z4, w4);

  return 13.5 * n + 0.5;
}

export interface NoiseEmbedding {
  width: number;
  height: number;
  wrapX: boolean;
  wrapY: boolean;
  tileScale: { x: number; y: number };
  noiseScale: number;
}

/** Noise dimensions needed: one per plain axis, two per wrapping axis */
export function embeddingDimensions(wrapX: boolean, wrapY: boolean): 2 | 3 | 4 {
  if (wrapX && wrapY) return 4;
  if (wrapX || wrapY) return 3;
  return 2;
}

/**
 * Builds a sampler over tile coordinates. The longer physical side of the
 * map spans `noiseScale` noise units; a wrapping axis is laid on a circle
 * of the same circumference so its two edges meet seamlessly.
 * `offsets` translates each noise dimension.
 */
export function makeWrappedNoise(
  shape: NoiseEmbedding,
  offsets: readonly number[]
): (x: number, y: number) => number {
  const spanX = shape.width * shape.tileScale.x;
  const spanY = shape.height * shape.tileScale.y;
  const unitsPerKm = shape.noiseScale / Math.max(spanX, spanY);

  const axis = (coord: number, count: number, tileKm: number, wraps: boolean): number[] => {
    if (!wraps) return [coord * tileKm * unitsPerKm];
    const radius = (count * tileKm * unitsPerKm) / (2 * Math.PI);
    const angle = (2 * Math.PI * coord) / count;
    return [radius * Math.cos(angle), radius * Math.sin(angle)];
  };

  const dims = embeddingDimensions(shape.wrapX, shape.wrapY);
  if (offsets.length < dims) {
    throw new Error(`makeWrappedNoise() needs ${dims} offsets, got ${offsets.length}`);
  }

  return (x, y) => {
    const p = [
      ...axis(x, shape.width, shape.tileScale.x, shape.wrapX),
      ...axis(y, shape.height, shape.tileScale.y, shape.wrapY),
    ].map((v, d) => v + offsets[d]);

    switch (dims) {
      case 2: return noise2D(p[0], p[1]);
      case 3: return noise3D(p[0], p[1], p[2]);
      case 4: return noise4D(p[0], p[1], p[2], p[3]);
    }
  };
}
