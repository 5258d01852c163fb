import { marked } from "marked";

const REPORT_CSS =
  "body{font-family:Arial, sans-serif; max-width:960px; margin:0 auto; padding:24px; color:#1f2937;} h1,h2,h3{color:#0f4c81;} table{border-collapse:collapse;} th,td{border:1px solid #d1d5db; padding:4px 8px;}";

export async function renderHtmlReport(
  markdown: string,
  options: { title?: string; includeCss?: boolean } = {}
): Promise<string> {
  const body = await marked.parse(markdown);
  const title = escapeHtml(options.title ?? "Root Cause Analysis Report");
  const style = options.includeCss === false ? "" : `<style>${REPORT_CSS}</style>`;
  return `<!doctype html><html><head><meta charset="utf-8"><title>${title}</title>${style}</head><body>${body}</body></html>`;
}

function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
