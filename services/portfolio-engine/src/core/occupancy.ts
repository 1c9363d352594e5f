import { clamp } from "./math-utils.js";

export type OccupancyModel = "logistic" | "linear";

export interface OccupancyProjection {
  initialPct: number;
  driftPctPerYear: number;
  years: number;
}

/**
 * Logistic adjustment toward 0% or 100% depending on the sign of the drift.
 *
 * `growthRate` scales how fast the curve moves; at 50% occupancy the slope is
 * `growthRate * 25 * drift` percentage points per year. Empty and fully let
 * buildings are fixed points of the curve.
 */
export function projectLogisticOccupancy(
  projection: OccupancyProjection,
  growthRate: number,
): number {
  const { initialPct, driftPctPerYear, years } = projection;
  if (!Number.isFinite(growthRate) || growthRate <= 0) {
    throw new RangeError("growthRate must be a positive finite number");
  }

  const p0 = clamp(initialPct, 0, 100) / 100;
  if (p0 === 0 || p0 === 1) {
    return p0 * 100;
  }

  const odds = (1 - p0) / p0;
  const finalPct = 100 / (1 + odds * Math.exp(-growthRate * driftPctPerYear * years));
  return clamp(finalPct, 0, 100);
}

export function projectLinearOccupancy(projection: OccupancyProjection): number {
  const { initialPct, driftPctPerYear, years } = projection;
  return clamp(initialPct + driftPctPerYear * years, 0, 100);
}

export function projectOccupancy(
  projection: OccupancyProjection,
  model: OccupancyModel,
  growthRate: number,
): number {
  switch (model) {
    case "logistic":
      return projectLogisticOccupancy(projection, growthRate);
    case "linear":
      return projectLinearOccupancy(projection);
  }
}
