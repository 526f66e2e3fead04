import type { Data, Layout, Shape } from 'plotly.js';
import type { Outline, Scene } from './modularMultiplication';

const LINE_COLOR = '#fff';
const POINT_COLOR = '#4ecdc4';

/** Outline as a Plotly layout shape: native circle, or a closed SVG path. */
export function outlineShape(outline: Outline): Partial<Shape> | null {
  if (outline.kind === 'circle') {
    const [lo, hi] = outline.bounds;
    return {
      type: 'circle',
      x0: lo.x, y0: lo.y, x1: hi.x, y1: hi.y,
      xref: 'x', yref: 'y',
      line: { color: LINE_COLOR, width: 1 },
    };
  }
  if (outline.vertices.length === 0) return null;
  const path = outline.vertices
    .map((v, i) => `${i === 0 ? 'M' : 'L'} ${v.x} ${v.y}`)
    .join(' ') + ' Z';
  return {
    type: 'path',
    path,
    xref: 'x', yref: 'y',
    line: { color: LINE_COLOR, width: 1 },
  };
}

/**
 * Every connection as one line trace: x/y run start, end, null, start, end,
 * null, ... so Plotly breaks the line between segments.
 */
export function connectionTrace(scene: Scene): Data {
  const x: (number | null)[] = [];
  const y: (number | null)[] = [];
  const pts = scene.edgePoints;
  for (const [start, end] of scene.connections) {
    if (start === end) continue;
    x.push(pts[start].x, pts[end].x, null);
    y.push(pts[start].y, pts[end].y, null);
  }
  return {
    x, y,
    type: 'scatter',
    mode: 'lines',
    line: { color: LINE_COLOR, width: 0.6 },
    hoverinfo: 'skip',
    showlegend: false,
  };
}

export function edgePointTrace(scene: Scene): Data {
  return {
    x: scene.edgePoints.map(p => p.x),
    y: scene.edgePoints.map(p => p.y),
    text: scene.connections.map(([start, end]) => `${start} → ${end}`),
    type: 'scatter',
    mode: 'markers',
    marker: { color: POINT_COLOR, size: 3 },
    hovertemplate: '%{text}<extra></extra>',
    showlegend: false,
  };
}

export function sceneLayout(scene: Scene, size: number): Partial<Layout> {
  const shape = outlineShape(scene.outline);
  return {
    title: { text: scene.caption, font: { color: '#ddd', size: 14, family: 'monospace' } },
    paper_bgcolor: '#000',
    plot_bgcolor: '#000',
    height: 720,
    margin: { t: 40, r: 10, b: 10, l: 10 },
    xaxis: {
      range: [0, size],
      scaleanchor: 'y',
      scaleratio: 1,
      visible: false,
    },
    yaxis: {
      // canvas orientation: y grows downward
      range: [size, 0],
      visible: false,
    },
    shapes: shape ? [shape] : [],
  };
}
