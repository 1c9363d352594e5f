import type { BuildingInput, CompletedSimulation, OccupancyModel, PortfolioForm, RunState } from "./types";

export type View = "inputs" | "results";

// Widget state persisted by the ChatGPT host
export interface WidgetState {
  buildings?: BuildingInput[];
  occupancyModel?: OccupancyModel;
  activeView?: View;
  simulation?: CompletedSimulation;
}

export interface RestoredWidget {
  form: PortfolioForm;
  view: View;
  runState: RunState;
}

/**
 * Merge saved host state over the current form. The results view is only
 * reopened when the saved state still carries the simulation it showed.
 */
export function restoreWidgetState(saved: WidgetState | null, current: PortfolioForm): RestoredWidget {
  if (!saved) {
    return { form: current, view: "inputs", runState: { phase: "idle" } };
  }

  const form: PortfolioForm = {
    buildings: saved.buildings && saved.buildings.length > 0 ? saved.buildings : current.buildings,
    occupancyModel: saved.occupancyModel ?? current.occupancyModel,
  };

  if (saved.activeView === "results" && saved.simulation) {
    return { form, view: "results", runState: { phase: "complete", simulation: saved.simulation } };
  }
  return { form, view: "inputs", runState: { phase: "idle" } };
}

export function toWidgetState(form: PortfolioForm, view: View, runState: RunState): WidgetState {
  return {
    buildings: form.buildings,
    occupancyModel: form.occupancyModel,
    activeView: view,
    ...(runState.phase === "complete" ? { simulation: runState.simulation } : {}),
  };
}
