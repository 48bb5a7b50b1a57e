export * from "./ast";
export { parse, renderHtml, parseMarkdown, parseMarkdownWithDebug, type ParseOptions } from "./parse-markdown";
export { renderAstToHtml } from "./renderer";
export { parseInlineString, assembleInlineLines } from "./inline-parser";
export { blockPhase } from "./block-parser";
export {
  createDebugTrace,
  countNodes,
  formatAst,
  formatNodeStats,
  type DebugSnapshot,
  type DebugTrace,
  type NodeCounts,
} from "./debug";
