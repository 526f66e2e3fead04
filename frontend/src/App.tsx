import { useEffect, useMemo, useRef, useState } from 'react';
import './App.css';
import {
  ANGLE_RANGE, DRAWING_SIZE, IMAGE_SIZE, MODULUS_RANGE, MULTIPLIER_RANGE, VERTEX_RANGE,
} from './config';
import { ModularMultiplicationDisplay, type Scene } from './modularMultiplication';
import ParameterControls, { type SliderValues } from './ParameterControls';
import { PatternErrorBoundary } from './PatternErrorBoundary';
import PatternPlot from './PatternPlot';
import { drawScene } from './sceneCanvas';

type View = 'canvas' | 'plot';

const INITIAL_VALUES: SliderValues = {
  vertexCount: VERTEX_RANGE.initial,
  modulus: MODULUS_RANGE.initial,
  multiplier: Math.min(MULTIPLIER_RANGE.initial, MODULUS_RANGE.initial),
  angleDeg: ANGLE_RANGE.initial,
};

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

function PatternCanvas({ scene }: { scene: Scene }) {
  const ref = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const ctx = ref.current?.getContext('2d');
    if (ctx) drawScene(ctx, scene, IMAGE_SIZE);
  }, [scene]);

  return (
    <canvas ref={ref} className="pattern" width={IMAGE_SIZE} height={IMAGE_SIZE}
      aria-label={scene.caption} />
  );
}

// ================================================================
// Main component
// ================================================================
export default function App() {
  const [values, setValues] = useState<SliderValues>(INITIAL_VALUES);
  const [view, setView] = useState<View>('canvas');

  // One display for the lifetime of the page; it keeps the geometry caches
  const displayRef = useRef<ModularMultiplicationDisplay | null>(null);
  if (displayRef.current === null) {
    displayRef.current = new ModularMultiplicationDisplay(IMAGE_SIZE, DRAWING_SIZE);
  }
  const display = displayRef.current;

  const scene = useMemo(() => {
    display.changeParameters(
      values.vertexCount, values.modulus, values.multiplier, toRadians(values.angleDeg),
    );
    return display.getScene();
  }, [display, values]);

  return (
    <div className="app">
      <h1 className="title">Modular Multiplication Visualization</h1>
      <p className="subtitle">
        i → i·K mod L &nbsp;|&nbsp; {scene.edgePoints.length} points &nbsp;|&nbsp;
        {scene.outline.kind === 'circle' ? ' circle' : ` ${values.vertexCount}-gon`}
      </p>

      <ParameterControls values={values} onChange={setValues} />

      <div className="view-toggle">
        <button className={view === 'canvas' ? 'btn active' : 'btn'}
          onClick={() => setView('canvas')}>Canvas</button>
        <button className={view === 'plot' ? 'btn active' : 'btn'}
          onClick={() => setView('plot')}>Interactive</button>
      </div>

      <PatternErrorBoundary>
        {view === 'canvas'
          ? <PatternCanvas scene={scene} />
          : <PatternPlot scene={scene} size={IMAGE_SIZE} />}
      </PatternErrorBoundary>
    </div>
  );
}
