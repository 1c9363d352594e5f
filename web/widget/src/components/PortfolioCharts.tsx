"use client";

import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import { buildChartData } from "@portfolio-sim/engine/formatters";
import { formatCurrency } from "@/lib/format";
import type { BuildingResult } from "@/lib/types";

function formatTooltipValue(value: unknown): string {
  return typeof value === "number" ? formatCurrency(value) : String(value);
}

function formatAxisTick(value: number): string {
  return `${(value / 1_000_000).toFixed(1)}M`;
}

export function PortfolioCharts({ results }: { results: BuildingResult[] }) {
  const { exitValues, capitalStack } = buildChartData(results);

  return (
    <div className="charts">
      <div className="chart">
        <h3>Exit value per building</h3>
        <ResponsiveContainer width="100%" height={260}>
          <BarChart data={exitValues}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="name" />
            <YAxis tickFormatter={formatAxisTick} />
            <Tooltip formatter={formatTooltipValue} />
            <Bar dataKey="exitValue" fill="#2f5d8a" name="Exit value" />
          </BarChart>
        </ResponsiveContainer>
      </div>

      <div className="chart">
        <h3>Equity vs debt</h3>
        <ResponsiveContainer width="100%" height={260}>
          <BarChart data={capitalStack}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="name" />
            <YAxis tickFormatter={formatAxisTick} />
            <Tooltip formatter={formatTooltipValue} />
            <Legend />
            <Bar dataKey="equity" stackId="capital" fill="#2f5d8a" name="Equity" />
            <Bar dataKey="debt" stackId="capital" fill="#9fb3c8" name="Debt" />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}
