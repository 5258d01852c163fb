export { renderHtmlReport } from "./html";
export { renderJsonReport } from "./json";
export {
  buildMarkdownReport,
  isReportFormat,
  REPORT_FORMATS,
  reportTitle,
  type ReportFormat
} from "./markdown";
