import { InvalidInputError } from './errors';

// ----------------------------------------------------------------
// Constants & types
// ----------------------------------------------------------------

/** Vertex count at which the polygon is drawn as a smooth circle. */
export const MAX_VERTEX_COUNT = 50;
export const SNAP_TOLERANCE = 1e-10;

export interface Point {
  x: number;
  y: number;
}

/** Index pair [start, end] into the edge-point list. */
export type Connection = [number, number];

export function isCircle(vertexCount: number): boolean {
  return vertexCount >= MAX_VERTEX_COUNT;
}

// ----------------------------------------------------------------
// Point helpers
// ----------------------------------------------------------------

/** Rotate a point about the origin by `angle` radians. */
export function rotatePoint(p: Point, angle: number): Point {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return { x: p.x * c - p.y * s, y: p.x * s + p.y * c };
}

function isPoint(value: unknown): value is Point {
  if (typeof value !== 'object' || value === null) return false;
  if (!('x' in value) || !('y' in value)) return false;
  return typeof value.x === 'number' && typeof value.y === 'number'
    && !Number.isNaN(value.x) && !Number.isNaN(value.y);
}

/**
 * Snap near-zero coordinates to exactly 0, x and y independently.
 * Rotation leaves values like 6e-17 where a clean 0 is expected.
 */
export function cleanPoints(values: readonly unknown[], tol = SNAP_TOLERANCE): Point[] {
  return values.map((v, i) => {
    if (!isPoint(v)) {
      throw new InvalidInputError(`Expected a numeric {x, y} point at index ${i}`);
    }
    return {
      x: Math.abs(v.x) < tol ? 0 : v.x,
      y: Math.abs(v.y) < tol ? 0 : v.y,
    };
  });
}

/** `count` evenly spaced points on a circle of radius `radius`, first one at angle 0. */
function unitRoots(count: number, radius: number): Point[] {
  return Array.from({ length: count }, (_, j) => {
    const θ = (2 * Math.PI * j) / count;
    return { x: radius * Math.cos(θ), y: radius * Math.sin(θ) };
  });
}

function placeOnCanvas(points: Point[], angle: number, center: Point): Point[] {
  const rotated = cleanPoints(points.map(p => rotatePoint(p, angle)));
  return rotated.map(p => ({ x: p.x + center.x, y: p.y + center.y }));
}

// ----------------------------------------------------------------
// Vertices, edge samples, connections
// ----------------------------------------------------------------

/**
 * Polygon corners on a circle of `radius` around `center`, the first one at
 * `angle`, the rest following at steps of 2π/vertexCount. Empty in circle mode.
 */
export function computeVertices(
  vertexCount: number, angle: number, radius: number, center: Point,
): Point[] {
  if (isCircle(vertexCount)) return [];
  return placeOnCanvas(unitRoots(vertexCount, radius), angle, center);
}

/**
 * Linear samples along each side (v_i, v_{i+1}). t runs over
 * `samplesPerSide` even steps in [0, 1), so corners are not repeated.
 */
export function polygonEdgeSamples(vertices: readonly Point[], samplesPerSide: number): Point[] {
  const points: Point[] = [];
  const n = vertices.length;
  for (let i = 0; i < n; i++) {
    const p1 = vertices[i];
    const p2 = vertices[(i + 1) % n];
    for (let s = 0; s < samplesPerSide; s++) {
      const t = s / samplesPerSide;
      points.push({
        x: (1 - t) * p1.x + t * p2.x,
        y: (1 - t) * p1.y + t * p2.y,
      });
    }
  }
  return points;
}

/**
 * Boundary samples the multiplication graph is drawn on.
 *
 * Circle mode: exactly `modulus` points. Polygon mode:
 * `vertexCount * floor(modulus / vertexCount)` points taken along `vertices`;
 * the remainder is dropped, so `modulus < vertexCount` yields none.
 */
export function computeEdgePoints(
  vertexCount: number,
  modulus: number,
  angle: number,
  radius: number,
  center: Point,
  vertices: readonly Point[],
): Point[] {
  if (isCircle(vertexCount)) {
    return placeOnCanvas(unitRoots(modulus, radius), angle, center);
  }
  const samplesPerSide = Math.floor(modulus / vertexCount);
  return polygonEdgeSamples(vertices, samplesPerSide);
}

/**
 * Pairs (i, i·multiplier mod edgePointCount) for every edge point.
 * The multiplier is reduced first so the product stays below 2^53.
 */
export function computeConnections(edgePointCount: number, multiplier: number): Connection[] {
  const connections: Connection[] = [];
  if (edgePointCount === 0) return connections;
  const k = multiplier % edgePointCount;
  for (let i = 0; i < edgePointCount; i++) {
    connections.push([i, (i * k) % edgePointCount]);
  }
  return connections;
}
