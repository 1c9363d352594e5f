// Portfolio Engine V1 input contract (see contracts/portfolio_v1.schema.json)
// Rates and ratios are percentages: 5 means 5%.

export interface ContractInput {
  contract_version: "PORTFOLIO_V1";
  engine_version?: string;
}

export interface BuildingInput {
  readonly name: string;
  readonly annual_rent: number;
  readonly purchase_cap_rate: number;
  readonly exit_cap_rate: number;
  readonly ltv: number;
  readonly interest_rate: number;
  readonly loan_term_years: number;
  readonly initial_occupancy: number;
  readonly occupancy_drift: number;
  readonly rent_indexation: number;
  readonly capex_budget: number;
  readonly opex_ratio: number;
}

export type BuildingField = Exclude<keyof BuildingInput, "name">;

export interface PortfolioOptionsInput {
  occupancy_model?: "logistic" | "linear";
  occupancy_growth_rate?: number;
}

export interface PortfolioInput {
  contract?: ContractInput;
  buildings: readonly BuildingInput[];
  options?: PortfolioOptionsInput;
}
