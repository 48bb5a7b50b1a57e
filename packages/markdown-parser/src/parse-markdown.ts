import { blockPhase } from "./block-parser";
import { renderAstToHtml } from "./renderer";
import type { DocumentNode } from "./ast";
import { countNodes, createDebugTrace, silentTrace, type DebugSnapshot, type DebugTrace, type NodeCounts } from "./debug";

export interface ParseOptions {
  /** Receives block-phase logs and AST snapshots for this call. */
  trace?: DebugTrace;
}

export function parse(markdown: string, options: ParseOptions = {}): DocumentNode {
  const trace = options.trace ?? silentTrace;
  const doc = blockPhase(markdown, trace);
  trace.captureSnapshot("afterBlockPhase", doc);
  return doc;
}

export function renderHtml(doc: DocumentNode): string {
  return renderAstToHtml(doc);
}

function renderTraced(doc: DocumentNode, trace: DebugTrace): string {
  const html = renderHtml(doc);
  if (trace.enabled) {
    trace.log(`Rendered ${doc.children.length} block(s) into ${html.length} character(s)`);
  }
  trace.captureSnapshot("afterRender", doc);
  return html;
}

export function parseMarkdown(markdown: string, options: ParseOptions = {}): string {
  const trace = options.trace ?? silentTrace;
  return renderTraced(parse(markdown, { trace }), trace);
}

export function parseMarkdownWithDebug(markdown: string): {
  html: string;
  snapshots: DebugSnapshot[];
  stats: NodeCounts;
} {
  const trace = createDebugTrace(true);
  const doc = parse(markdown, { trace });
  const html = renderTraced(doc, trace);
  return { html, snapshots: trace.getSnapshots(), stats: countNodes(doc) };
}
