import type { Dose, Regimen } from '../types/clinical';

interface UnitInfo {
  family: string;
  factor: number;
}

const UNIT_TABLE: Record<string, UnitInfo> = {
  mcg: { family: 'mass', factor: 0.001 },
  ug: { family: 'mass', factor: 0.001 },
  'µg': { family: 'mass', factor: 0.001 },
  mg: { family: 'mass', factor: 1 },
  g: { family: 'mass', factor: 1000 },
  ml: { family: 'volume', factor: 1 },
  l: { family: 'volume', factor: 1000 },
  unit: { family: 'units', factor: 1 },
  units: { family: 'units', factor: 1 },
  iu: { family: 'units', factor: 1 },
};

const unitKey = (unit: string): string => unit.trim().toLowerCase();

const unitInfo = (unit: string): UnitInfo => {
  const key = unitKey(unit);
  return UNIT_TABLE[key] ?? { family: `raw:${key}`, factor: 1 };
};

/** Dose in its family's base unit, rounded to avoid float drift (0.5 g → 500 mg). */
function baseAmount(dose: Dose): number {
  return Math.round(dose.value * unitInfo(dose.unit).factor * 1e6) / 1e6;
}

export function sameUnitFamily(a: Dose, b: Dose): boolean {
  return unitInfo(a.unit).family === unitInfo(b.unit).family;
}

export interface DoseComparison {
  /** -1 when `next` is lower, 1 when higher, 0 when equal. */
  direction: -1 | 0 | 1;
  /** False when the units belong to different families and raw values were compared. */
  comparable: boolean;
}

export function compareDoses(previous: Dose, next: Dose): DoseComparison {
  const comparable = sameUnitFamily(previous, next);
  const before = comparable ? baseAmount(previous) : previous.value;
  const after = comparable ? baseAmount(next) : next.value;
  const direction = after > before ? 1 : after < before ? -1 : 0;
  return { direction, comparable };
}

/** Stable identity of a regimen; equal keys mean the same dose and frequency. */
export function regimenKey(regimen: Regimen): string {
  const info = unitInfo(regimen.dose.unit);
  return `${baseAmount(regimen.dose)}:${info.family}:${regimen.frequency}`;
}

export function sameRegimen(a: Regimen, b: Regimen): boolean {
  return regimenKey(a) === regimenKey(b);
}

export function formatRegimen(regimen: Regimen): string {
  return `${regimen.dose.value} ${regimen.dose.unit} ${regimen.frequency}`;
}
