import type { BuildingField } from "@portfolio-sim/engine";

export interface FieldSpec {
  key: BuildingField;
  label: string;
  min?: number;
  max?: number;
  step: number;
}

export interface FieldGroup {
  title: string;
  fields: FieldSpec[];
}

// Form bounds; the engine enforces its own ranges on submit
export const BUILDING_FIELD_GROUPS: readonly FieldGroup[] = [
  {
    title: "Acquisition",
    fields: [
      { key: "annual_rent", label: "Annual gross rent (€)", min: 0, step: 1000 },
      { key: "purchase_cap_rate", label: "Purchase cap rate (%)", min: 1, max: 20, step: 0.1 },
      { key: "capex_budget", label: "Capex budget (€)", min: 0, step: 1000 },
    ],
  },
  {
    title: "Financing",
    fields: [
      { key: "ltv", label: "LTV (%)", min: 0, max: 100, step: 1 },
      { key: "interest_rate", label: "Interest rate (%)", min: 0, max: 20, step: 0.1 },
      { key: "loan_term_years", label: "Loan term (years)", min: 1, max: 30, step: 1 },
    ],
  },
  {
    title: "Operations",
    fields: [
      { key: "initial_occupancy", label: "Initial occupancy (%)", min: 0, max: 100, step: 1 },
      { key: "occupancy_drift", label: "Occupancy drift (%/yr)", min: -10, max: 10, step: 0.1 },
      { key: "rent_indexation", label: "Rent indexation (%/yr)", min: 0, max: 10, step: 0.1 },
      { key: "opex_ratio", label: "Operating costs (% of revenue)", min: 0, max: 100, step: 1 },
    ],
  },
  {
    title: "Exit",
    fields: [{ key: "exit_cap_rate", label: "Exit cap rate (%)", min: 1, max: 20, step: 0.1 }],
  },
];
