// Browser-safe entry: pure formatters with no filesystem access
export { formatResultsAsCsv, RESULT_COLUMNS, CSV_FILENAME, CSV_MIME_TYPE } from "./results-csv.js";
export { buildChartData } from "./chart-data.js";
export type { ExitValueBar, CapitalStackBar, PortfolioChartData } from "./chart-data.js";
export { createSummaryReport } from "./summary-report.js";
