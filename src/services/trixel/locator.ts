import { ConfigurationError, InvalidDepthError } from '../../utils/errors.js';
import type { HomeLocation, TrixelId } from '../../types/contribution.js';

/**
 * Finest depth whose ids stay within Number.MAX_SAFE_INTEGER (16 * 4^24 = 2^52).
 */
export const MAX_SUPPORTED_DEPTH = 24;

type Vec3 = readonly [number, number, number];
type Triangle = readonly [Vec3, Vec3, Vec3];

const V0: Vec3 = [0, 0, 1];
const V1: Vec3 = [1, 0, 0];
const V2: Vec3 = [0, 1, 0];
const V3: Vec3 = [-1, 0, 0];
const V4: Vec3 = [0, -1, 0];
const V5: Vec3 = [0, 0, -1];

/**
 * Octahedron faces of the hierarchical triangular mesh, S0..S3 then N0..N3.
 * Corners are counter-clockwise seen from outside the sphere.
 */
const ROOT_TRIXELS: ReadonlyArray<{ id: TrixelId; corners: Triangle }> = [
  { id: 8, corners: [V1, V5, V2] },
  { id: 9, corners: [V2, V5, V3] },
  { id: 10, corners: [V3, V5, V4] },
  { id: 11, corners: [V4, V5, V1] },
  { id: 12, corners: [V1, V0, V4] },
  { id: 13, corners: [V4, V0, V3] },
  { id: 14, corners: [V3, V0, V2] },
  { id: 15, corners: [V2, V0, V1] },
];

function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

function midpoint(a: Vec3, b: Vec3): Vec3 {
  const x = a[0] + b[0];
  const y = a[1] + b[1];
  const z = a[2] + b[2];
  const length = Math.sqrt(x * x + y * y + z * z);
  return [x / length, y / length, z / length];
}

function toCartesian(latitude: number, longitude: number): Vec3 {
  const lat = (latitude * Math.PI) / 180;
  const lon = (longitude * Math.PI) / 180;
  return [Math.cos(lat) * Math.cos(lon), Math.cos(lat) * Math.sin(lon), Math.sin(lat)];
}

/**
 * Smallest signed distance of the point to the triangle's great-circle edges.
 * Non-negative iff the point lies inside (or on) the triangle.
 */
function containment([a, b, c]: Triangle, p: Vec3): number {
  return Math.min(dot(cross(a, b), p), dot(cross(b, c), p), dot(cross(c, a), p));
}

/**
 * Index of the triangle that contains p; ties on shared edges go to the lowest index.
 */
function pick(triangles: readonly Triangle[], p: Vec3): number {
  let best = 0;
  let bestScore = -Infinity;
  triangles.forEach((triangle, index) => {
    const score = containment(triangle, p);
    if (score > bestScore) {
      bestScore = score;
      best = index;
    }
  });
  return best;
}

function subdivide([v0, v1, v2]: Triangle): Triangle[] {
  const w0 = midpoint(v1, v2);
  const w1 = midpoint(v0, v2);
  const w2 = midpoint(v0, v1);
  return [
    [v0, w2, w1],
    [v1, w0, w2],
    [v2, w1, w0],
    [w0, w1, w2],
  ];
}

function assertDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 0 || depth > MAX_SUPPORTED_DEPTH) {
    throw new InvalidDepthError(depth, MAX_SUPPORTED_DEPTH);
  }
}

/**
 * Trixel id of the home coordinate at the given depth.
 *
 * Pure and deterministic; depth 0 yields one of the eight root ids (8-15),
 * every further level appends two bits (`parent * 4 + child`).
 */
export function locate(home: HomeLocation, depth: number): TrixelId {
  assertDepth(depth);
  const { latitude, longitude } = home;
  if (
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    throw new ConfigurationError(`Invalid home coordinate ${latitude}, ${longitude}`);
  }

  const p = toCartesian(latitude, longitude);
  const root = ROOT_TRIXELS[pick(ROOT_TRIXELS.map((r) => r.corners), p)];
  if (!root) {
    throw new Error('Root trixel lookup failed');
  }

  let id = root.id;
  let triangle = root.corners;
  for (let level = 1; level <= depth; level++) {
    const children = subdivide(triangle);
    const index = pick(children, p);
    const child = children[index];
    if (!child) {
      throw new Error(`Child trixel lookup failed at level ${level}`);
    }
    id = id * 4 + index;
    triangle = child;
  }
  return id;
}

/**
 * Depth encoded in a trixel id.
 */
export function trixelDepth(id: TrixelId): number {
  if (!Number.isSafeInteger(id) || id < 8) {
    throw new InvalidDepthError(-1, MAX_SUPPORTED_DEPTH);
  }
  let depth = 0;
  let current = id;
  while (current >= 16) {
    current = Math.floor(current / 4);
    depth++;
  }
  return depth;
}

/**
 * Enclosing trixel one level up.
 */
export function parentTrixel(id: TrixelId): TrixelId {
  if (trixelDepth(id) === 0) {
    throw new InvalidDepthError(-1, MAX_SUPPORTED_DEPTH);
  }
  return Math.floor(id / 4);
}
