export {
  RESULT_SECTIONS,
  breakdownResults,
  type BreakdownRow,
  type ResultSection,
} from './model/breakdown.js';
export {
  HTML_PREVIEW_LIMIT,
  quoteHtml,
  renderBreakdownTable,
  renderTextReport,
} from './render/table.js';
export { renderMarkdownReport, type MarkdownReportOptions } from './render/markdown.js';
export { renderJsonReport, sortKeys } from './render/json.js';
