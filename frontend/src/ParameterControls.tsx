import { useEffect, useState } from 'react';
import { ANGLE_RANGE, MODULUS_RANGE, MULTIPLIER_RANGE, VERTEX_RANGE } from './config';

interface SliderRowProps {
  label: string;
  min: number;
  max: number;
  value: number;
  onChange: (value: number) => void;
  /** Suffix shown after the value, e.g. "°". */
  unit?: string;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

/**
 * Range slider plus a number entry bound to the same value.
 * The slider applies while dragging; the entry applies on Enter or blur.
 */
export function SliderRow({ label, min, max, value, onChange, unit = '' }: SliderRowProps) {
  const [draft, setDraft] = useState(String(value));

  // Keep the entry in step with slider moves and outside clamps
  useEffect(() => { setDraft(String(value)); }, [value]);

  const commit = () => {
    const n = Math.round(Number(draft));
    if (draft.trim() === '' || !Number.isFinite(n)) {
      setDraft(String(value));
      return;
    }
    const next = clamp(n, min, max);
    setDraft(String(next));
    if (next !== value) onChange(next);
  };

  return (
    <label className="ctrl">
      <span>{label}: <b>{value}{unit}</b></span>
      <input type="range" min={min} max={max} step={1}
        aria-label={`${label} slider`}
        value={value} onChange={e => onChange(+e.target.value)} />
      <input type="number" className="entry" min={min} max={max} step={1}
        aria-label={`${label} entry`}
        value={draft}
        onChange={e => setDraft(e.target.value)}
        onKeyDown={e => { if (e.key === 'Enter') commit(); }}
        onBlur={commit} />
    </label>
  );
}

// ----------------------------------------------------------------
// The four parameter rows
// ----------------------------------------------------------------

export interface SliderValues {
  vertexCount: number;
  modulus: number;
  multiplier: number;
  /** Degrees; converted to radians before it reaches the display. */
  angleDeg: number;
}

/** Apply a modulus edit; the multiplier can never exceed the modulus. */
export function withModulus(values: SliderValues, modulus: number): SliderValues {
  return { ...values, modulus, multiplier: Math.min(values.multiplier, modulus) };
}

interface Props {
  values: SliderValues;
  onChange: (values: SliderValues) => void;
}

export default function ParameterControls({ values, onChange }: Props) {
  return (
    <div className="controls">
      <SliderRow label="Vertex count" min={VERTEX_RANGE.min} max={VERTEX_RANGE.max}
        value={values.vertexCount}
        onChange={vertexCount => onChange({ ...values, vertexCount })} />
      <SliderRow label="Modulus" min={MODULUS_RANGE.min} max={MODULUS_RANGE.max}
        value={values.modulus}
        onChange={modulus => onChange(withModulus(values, modulus))} />
      <SliderRow label="Multiplier" min={MULTIPLIER_RANGE.min} max={values.modulus}
        value={values.multiplier}
        onChange={multiplier => onChange({ ...values, multiplier })} />
      <SliderRow label="Angle" min={ANGLE_RANGE.min} max={ANGLE_RANGE.max} unit="°"
        value={values.angleDeg}
        onChange={angleDeg => onChange({ ...values, angleDeg })} />
    </div>
  );
}
