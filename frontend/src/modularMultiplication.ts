import {
  computeConnections, computeEdgePoints, computeVertices, isCircle,
  type Connection, type Point,
} from './geometry';

// ----------------------------------------------------------------
// Types
// ----------------------------------------------------------------

export interface Parameters {
  vertexCount: number;
  modulus: number;
  multiplier: number;
  /** Rotation in radians. */
  angle: number;
}

export type Outline =
  | { kind: 'circle'; center: Point; radius: number; bounds: [Point, Point] }
  | { kind: 'polygon'; vertices: readonly Readonly<Point>[] };

export interface Scene {
  outline: Outline;
  edgePoints: readonly Readonly<Point>[];
  connections: readonly Readonly<Connection>[];
  caption: string;
}

/** Which cached stages a `changeParameters` call rebuilt. */
export interface RecomputeReport {
  vertices: boolean;
  edgePoints: boolean;
  connections: boolean;
}

export function formatCaption(p: Omit<Parameters, 'angle'>): string {
  const circle = isCircle(p.vertexCount);
  const shape = circle ? 'circle' : 'polygon';
  const vertexPart = circle ? '' : `, V=${p.vertexCount}`;
  return `Modular multiplication ${shape}${vertexPart}, M=${p.modulus}, K=${p.multiplier}`;
}

/** Freeze a cache and its entries; scenes hand them out without copying. */
function freezeAll<T extends object>(items: T[]): readonly Readonly<T>[] {
  for (const item of items) Object.freeze(item);
  return Object.freeze(items);
}

// ----------------------------------------------------------------
// ModularMultiplicationDisplay — parameter state + derived caches
// ----------------------------------------------------------------

export class ModularMultiplicationDisplay {
  readonly imageSize: number;
  readonly drawingWidth: number;
  readonly center: Point;

  /** Last applied parameters; null until the first `changeParameters`. */
  private _params: Parameters | null = null;

  private _vertices: readonly Readonly<Point>[] = [];
  private _edgePoints: readonly Readonly<Point>[] = [];
  private _connections: readonly Readonly<Connection>[] = [];

  constructor(imageSize: number, drawingWidth: number) {
    this.imageSize = imageSize;
    this.drawingWidth = drawingWidth;
    const c = Math.floor(imageSize / 2);
    this.center = { x: c, y: c };
  }

  get radius(): number {
    return this.drawingWidth / 2;
  }

  get parameters(): Parameters | null {
    return this._params && { ...this._params };
  }

  isCircle(): boolean {
    return this._params !== null && isCircle(this._params.vertexCount);
  }

  /**
   * Apply new parameters, rebuilding only the stale stages:
   *   vertices     ← angle, vertex count
   *   edge points  ← angle, vertex count, modulus
   *   connections  ← edge-point count, multiplier
   * Edge points must be rebuilt before their count is compared.
   */
  changeParameters(
    vertexCount: number, modulus: number, multiplier: number, angle: number,
  ): RecomputeReport {
    const prev = this._params;
    const vertexChanged = prev === null || prev.vertexCount !== vertexCount;
    const modulusChanged = prev === null || prev.modulus !== modulus;
    const multiplierChanged = prev === null || prev.multiplier !== multiplier;
    const angleChanged = prev === null || prev.angle !== angle;
    const prevEdgeCount = this._edgePoints.length;

    const recomputeVertices = angleChanged || vertexChanged;
    const recomputeEdgePoints = recomputeVertices || modulusChanged;

    if (recomputeVertices) {
      this._vertices = freezeAll(computeVertices(vertexCount, angle, this.radius, this.center));
    }
    if (recomputeEdgePoints) {
      this._edgePoints = freezeAll(computeEdgePoints(
        vertexCount, modulus, angle, this.radius, this.center, this._vertices,
      ));
    }

    const edgeCountChanged = prevEdgeCount !== this._edgePoints.length;
    const recomputeConnections = edgeCountChanged || multiplierChanged;
    if (recomputeConnections) {
      this._connections = freezeAll(computeConnections(this._edgePoints.length, multiplier));
    }

    this._params = { vertexCount, modulus, multiplier, angle };

    return {
      vertices: recomputeVertices,
      edgePoints: recomputeEdgePoints,
      connections: recomputeConnections,
    };
  }

  /** Snapshot of the cached geometry for a renderer. Never recomputes. */
  getScene(): Scene {
    const params = this._params;
    if (params === null) {
      throw new Error('getScene() called before changeParameters()');
    }
    const r = this.radius;
    const { x: cx, y: cy } = this.center;
    const outline: Outline = isCircle(params.vertexCount)
      ? {
          kind: 'circle',
          center: { ...this.center },
          radius: r,
          bounds: [{ x: cx - r, y: cy - r }, { x: cx + r, y: cy + r }],
        }
      : { kind: 'polygon', vertices: this._vertices };

    return {
      outline,
      edgePoints: this._edgePoints,
      connections: this._connections,
      caption: formatCaption(params),
    };
  }
}
