import type { Scene } from './modularMultiplication';

/** The slice of the 2D context the scene drawing touches. */
export type SceneContext = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle' | 'strokeStyle' | 'lineWidth' | 'font' | 'textAlign' | 'textBaseline'
  | 'fillRect' | 'beginPath' | 'moveTo' | 'lineTo' | 'closePath' | 'arc' | 'stroke' | 'fillText'
>;

const BACKGROUND = '#000';
const FOREGROUND = '#fff';
const CAPTION_FONT = '20px monospace';
const CAPTION_POS = { x: 40, y: 5 };

// ----------------------------------------------------------------
// Draw: outline → connections → caption, on a black square
// ----------------------------------------------------------------
export function drawScene(ctx: SceneContext, scene: Scene, size: number) {
  ctx.fillStyle = BACKGROUND;
  ctx.fillRect(0, 0, size, size);

  ctx.strokeStyle = FOREGROUND;
  ctx.lineWidth = 1;

  const { outline } = scene;
  ctx.beginPath();
  if (outline.kind === 'circle') {
    ctx.arc(outline.center.x, outline.center.y, outline.radius, 0, 2 * Math.PI);
  } else if (outline.vertices.length > 0) {
    const [first, ...rest] = outline.vertices;
    ctx.moveTo(first.x, first.y);
    for (const v of rest) ctx.lineTo(v.x, v.y);
    ctx.closePath();
  }
  ctx.stroke();

  // All segments in one path; self-loops collapse to nothing
  const pts = scene.edgePoints;
  ctx.beginPath();
  for (const [start, end] of scene.connections) {
    if (start === end) continue;
    ctx.moveTo(pts[start].x, pts[start].y);
    ctx.lineTo(pts[end].x, pts[end].y);
  }
  ctx.stroke();

  ctx.fillStyle = FOREGROUND;
  ctx.font = CAPTION_FONT;
  ctx.textAlign = 'left';
  ctx.textBaseline = 'top';
  ctx.fillText(scene.caption, CAPTION_POS.x, CAPTION_POS.y);
}
