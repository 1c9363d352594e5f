"use client";

import { CSV_FILENAME, CSV_MIME_TYPE, formatResultsAsCsv } from "@portfolio-sim/engine/formatters";
import { PortfolioCharts } from "@/components/PortfolioCharts";
import { formatCurrency, formatPercent } from "@/lib/format";
import type { BuildingResult, CompletedSimulation, RunState } from "@/lib/types";

interface Props {
  runState: RunState;
  onRunAgain: () => void;
}

function downloadCsv(results: BuildingResult[]) {
  const blob = new Blob([formatResultsAsCsv(results)], { type: CSV_MIME_TYPE });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = CSV_FILENAME;
  link.click();
  URL.revokeObjectURL(url);
}

export function ResultsView({ runState, onRunAgain }: Props) {
  if (runState.phase === "idle") {
    return null;
  }

  return (
    <div className="results-view">
      <h2>Portfolio Results</h2>

      {/* Status Display */}
      <div className={`status-banner status-${runState.phase}`}>
        {runState.phase === "running" && "Running simulation..."}
        {runState.phase === "complete" && "Simulation Complete"}
        {runState.phase === "failed" && (
          <>
            <strong>Failed:</strong> {runState.error}
          </>
        )}
      </div>

      {runState.phase === "failed" && runState.errors.length > 0 && (
        <div className="validation-errors">
          <ul>
            {runState.errors.map((err, i) => (
              <li key={i}>
                <strong>{err.path}:</strong> {err.message}
              </li>
            ))}
          </ul>
        </div>
      )}

      {runState.phase === "complete" && <CompletedResults {...runState.simulation} />}

      <div className="action-buttons">
        <button type="button" className="btn btn-secondary" onClick={onRunAgain}>
          {runState.phase === "failed" ? "Try Again" : "Edit Inputs"}
        </button>
      </div>
    </div>
  );
}

function CompletedResults({
  results,
  failures,
  summary,
  warnings,
}: CompletedSimulation) {
  return (
    <>
      {warnings.length > 0 && (
        <div className="warning-notice">
          {warnings.map((warning, i) => (
            <div key={i}>
              <strong>⚠</strong> {warning}
            </div>
          ))}
        </div>
      )}

      {/* Portfolio totals */}
      <div className="metrics-grid">
        <div className="metric-card">
          <div className="metric-label">Buildings</div>
          <div className="metric-value">{summary.buildingCount}</div>
        </div>
        <div className="metric-card">
          <div className="metric-label">Total Equity</div>
          <div className="metric-value">{formatCurrency(summary.totalEquity)}</div>
        </div>
        <div className="metric-card">
          <div className="metric-label">Total Debt</div>
          <div className="metric-value">{formatCurrency(summary.totalDebt)}</div>
        </div>
        <div className="metric-card">
          <div className="metric-label">Total NOI</div>
          <div className="metric-value">{formatCurrency(summary.totalNoi)}</div>
        </div>
        <div className="metric-card">
          <div className="metric-label">Total Exit Value</div>
          <div className="metric-value">{formatCurrency(summary.totalExitValue)}</div>
        </div>
      </div>

      {results.length > 0 && (
        <>
          <table className="results-table">
            <thead>
              <tr>
                <th>Building</th>
                <th>Investment</th>
                <th>Debt</th>
                <th>Equity</th>
                <th>Monthly payment</th>
                <th>Final occupancy</th>
                <th>Revenue</th>
                <th>NOI</th>
                <th>Exit value</th>
              </tr>
            </thead>
            <tbody>
              {results.map((r, idx) => (
                <tr key={idx}>
                  <td>{r.name}</td>
                  <td>{formatCurrency(r.totalInvestment)}</td>
                  <td>{formatCurrency(r.debtAmount)}</td>
                  <td>{formatCurrency(r.equityAmount)}</td>
                  <td>{formatCurrency(r.monthlyPayment)}</td>
                  <td>{formatPercent(r.finalOccupancy)}</td>
                  <td>{formatCurrency(r.finalAnnualRevenue)}</td>
                  <td className={r.annualNoi < 0 ? "negative" : undefined}>{formatCurrency(r.annualNoi)}</td>
                  <td>{formatCurrency(r.exitValue)}</td>
                </tr>
              ))}
            </tbody>
          </table>

          <PortfolioCharts results={results} />

          <div className="download-section">
            <button type="button" className="btn btn-download" onClick={() => downloadCsv(results)}>
              Download CSV
            </button>
          </div>
        </>
      )}

      {failures.length > 0 && (
        <div className="validation-errors">
          <h4>Excluded buildings:</h4>
          <ul>
            {failures.map((failure) => (
              <li key={failure.index}>
                <strong>{failure.name || `Building ${failure.index + 1}`}</strong>
                <ul>
                  {failure.errors.map((err, i) => (
                    <li key={i}>
                      {err.path}: {err.message}
                    </li>
                  ))}
                </ul>
              </li>
            ))}
          </ul>
        </div>
      )}
    </>
  );
}
