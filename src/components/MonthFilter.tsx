import { MONTHS_ES, shiftMonth } from "@/utils/months";
import type { Period } from "@/store/useStore";
import { IconButton } from "@/components/ui/Button";
import { ChevronLeftIcon, ChevronRightIcon } from "@/components/ui/Icons";

export const MIN_YEAR = 2020;
export const MAX_YEAR = 2100;

export interface MonthFilterProps {
  value: Period;
  onChange: (next: Period) => void;
  yearLabel?: string;
  monthLabel?: string;
}

function clampYear(raw: string, fallback: number): number {
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(MAX_YEAR, Math.max(MIN_YEAR, n));
}

/** Year + month-by-name picker, with arrows to step one month. */
export default function MonthFilter({ value, onChange, yearLabel = "Año", monthLabel = "Mes" }: MonthFilterProps) {
  const step = (delta: number) => {
    const next = shiftMonth(value.year, value.month, delta);
    if (next.year >= MIN_YEAR && next.year <= MAX_YEAR) onChange(next);
  };

  return (
    <div style={{ display: "flex", gap: 12, alignItems: "flex-end" }}>
      <IconButton variant="ghost" aria-label="Mes anterior" onClick={() => step(-1)}>
        <ChevronLeftIcon />
      </IconButton>
      <label className="field" style={{ flex: 1 }}>
        {yearLabel}
        <input
          type="number"
          min={MIN_YEAR}
          max={MAX_YEAR}
          step={1}
          value={value.year}
          onChange={(e) => onChange({ ...value, year: clampYear(e.target.value, value.year) })}
        />
      </label>
      <label className="field" style={{ flex: 2 }}>
        {monthLabel}
        <select value={value.month} onChange={(e) => onChange({ ...value, month: Number(e.target.value) })}>
          {MONTHS_ES.map((name, i) => (
            <option key={name} value={i + 1}>
              {name}
            </option>
          ))}
        </select>
      </label>
      <IconButton variant="ghost" aria-label="Mes siguiente" onClick={() => step(1)}>
        <ChevronRightIcon />
      </IconButton>
    </div>
  );
}
