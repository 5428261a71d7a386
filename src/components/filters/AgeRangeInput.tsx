import type { AgeRange } from '../../types/appointment';

interface AgeRangeInputProps {
  value: AgeRange;
  /** Observed ages in the dataset; the slider track always covers the value too */
  bounds: AgeRange;
  onChange: (value: AgeRange) => void;
}

const MARKS = [0, 50, 100];

/**
 * Inclusive age interval: two sliders over a shared track plus exact inputs.
 */
export function AgeRangeInput({ value, bounds, onChange }: AgeRangeInputProps) {
  const [low, high] = value;
  const min = Math.min(bounds[0], low, 0);
  const max = Math.max(bounds[1], high, 100);

  const setLow = (next: number) => {
    if (Number.isFinite(next)) onChange([Math.min(next, high), high]);
  };
  const setHigh = (next: number) => {
    if (Number.isFinite(next)) onChange([low, Math.max(next, low)]);
  };

  const inputClass =
    'w-16 px-2 py-1 bg-[var(--bg-secondary)] border border-[var(--border)] rounded-md text-sm text-[var(--text)] focus:outline-none focus:border-[var(--accent)]';

  return (
    <div className="space-y-2">
      <div className="flex items-center justify-between gap-2">
        <input
          type="number"
          aria-label="Minimum age"
          min={min}
          max={high}
          value={low}
          onChange={(e) => setLow(e.target.valueAsNumber)}
          className={inputClass}
        />
        <span className="text-xs text-[var(--text-dim)]">to</span>
        <input
          type="number"
          aria-label="Maximum age"
          min={low}
          max={max}
          value={high}
          onChange={(e) => setHigh(e.target.valueAsNumber)}
          className={inputClass}
        />
      </div>

      <div className="space-y-1">
        <input
          type="range"
          aria-label="Minimum age slider"
          min={min}
          max={max}
          value={low}
          onChange={(e) => setLow(Number(e.target.value))}
          className="w-full accent-[var(--accent)]"
        />
        <input
          type="range"
          aria-label="Maximum age slider"
          min={min}
          max={max}
          value={high}
          onChange={(e) => setHigh(Number(e.target.value))}
          className="w-full accent-[var(--accent)]"
        />
        <div className="flex justify-between text-[10px] text-[var(--text-dim)]">
          {MARKS.map((mark) => (
            <span key={mark}>{mark}</span>
          ))}
        </div>
      </div>
    </div>
  );
}
