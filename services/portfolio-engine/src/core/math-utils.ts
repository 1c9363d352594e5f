function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

// Payment function (like Excel PMT)
// Returns the periodic payment for a loan, negative for money paid out
export function pmt(
  rate: number,
  nper: number,
  pv: number,
  fv = 0,
  type: 0 | 1 = 0,
): number {
  assertFiniteNumber(rate, "rate");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");

  if (!Number.isInteger(nper) || nper <= 0) {
    throw new RangeError("nper must be a positive integer");
  }
  if (type !== 0 && type !== 1) {
    throw new RangeError("type must be 0 or 1");
  }
  if (rate <= -1) {
    throw new RangeError("rate must be greater than -1");
  }

  if (rate === 0) {
    return -(pv + fv) / nper;
  }

  const pow = Math.pow(1 + rate, nper);
  return -(rate * (fv + pv * pow)) / ((1 + rate * type) * (pow - 1));
}

// Value of `initial` after `periods` of compounding at `rate` (decimal)
export function compound(initial: number, rate: number, periods: number): number {
  assertFiniteNumber(initial, "initial");
  assertFiniteNumber(rate, "rate");
  assertFiniteNumber(periods, "periods");
  if (rate <= -1) {
    throw new RangeError("rate must be greater than -1");
  }
  return initial * Math.pow(1 + rate, periods);
}

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    throw new Error("Computation produced NaN");
  }
  if (min > max) {
    throw new RangeError("min must not exceed max");
  }
  return Math.min(max, Math.max(min, value));
}

// Percent (5 = 5%) to decimal
export function pct(value: number): number {
  assertFiniteNumber(value, "value");
  return value / 100;
}

// Annual percentage rate to a monthly decimal rate (nominal, not effective)
export function annualPctToMonthly(annualPct: number): number {
  return pct(annualPct) / 12;
}

export function roundTo(value: number, decimals: number): number {
  assertFiniteNumber(value, "value");
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError("decimals must be a non-negative integer");
  }
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
