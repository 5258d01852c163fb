import type { AnalysisResult } from "../../../shared/src/contracts";

/** Key order follows the aggregator, so equal results serialize identically. */
export function renderJsonReport(result: AnalysisResult): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}
