import { useMemo } from 'react';
import Plot from 'react-plotly.js';
import type { Scene } from './modularMultiplication';
import { connectionTrace, edgePointTrace, sceneLayout } from './scenePlot';

interface Props {
  scene: Scene;
  size: number;
}

export default function PatternPlot({ scene, size }: Props) {
  const data = useMemo(() => [connectionTrace(scene), edgePointTrace(scene)], [scene]);
  const layout = useMemo(() => sceneLayout(scene, size), [scene, size]);

  return (
    <Plot
      data={data}
      layout={layout}
      config={{
        displayModeBar: true,
        modeBarButtonsToRemove: ['lasso2d', 'select2d', 'autoScale2d'],
        responsive: true,
        scrollZoom: true,
      }}
      useResizeHandler
      style={{ width: '100%' }}
    />
  );
}
