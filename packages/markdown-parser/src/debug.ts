import type { DocumentNode, MarkdownNode, NodeType } from "./ast";
import { hasChildren } from "./ast";

export interface DebugSnapshot {
    stage: string;
    ast: DocumentNode;
    logs: string[];
}

/**
 * Collects log lines and AST snapshots for one parse. A disabled trace drops
 * everything, so callers guard expensive messages with `trace.enabled`.
 */
export interface DebugTrace {
    readonly enabled: boolean;
    log(message: string): void;
    captureSnapshot(stage: string, doc: DocumentNode): void;
    getSnapshots(): DebugSnapshot[];
}

export function createDebugTrace(enabled: boolean): DebugTrace {
    let logs: string[] = [];
    const snapshots: DebugSnapshot[] = [];

    return {
        enabled,
        log(message) {
            if (!enabled) return;
            logs.push(message);
        },
        captureSnapshot(stage, doc) {
            if (!enabled) return;
            snapshots.push({ stage, ast: structuredClone(doc), logs });
            logs = [];
        },
        getSnapshots() {
            return [...snapshots];
        },
    };
}

export const silentTrace: DebugTrace = createDebugTrace(false);

export type NodeCounts = Partial<Record<NodeType, number>>;

export function countNodes(node: MarkdownNode, counts: NodeCounts = {}): NodeCounts {
    counts[node.type] = (counts[node.type] ?? 0) + 1;
    if (hasChildren(node)) {
        for (const child of node.children) {
            countNodes(child, counts);
        }
    }
    return counts;
}

export function formatNodeStats(counts: NodeCounts): string {
    const lines = Object.entries(counts)
        .sort(([a], [b]) => (a < b ? -1 : 1))
        .map(([type, count]) => `  ${type}: ${count}`);
    return ["Node type counts:", ...lines].join("\n");
}

function describeNode(node: MarkdownNode): string {
    let line: string = node.type;
    if ("literal" in node) line += ` "${node.literal}"`;
    if (node.type === "heading") line += ` level=${node.level}`;
    if (node.type === "ordered_list") line += ` start=${node.start}`;
    if ("destination" in node) line += ` destination=${node.destination}`;
    if (node.type === "code_block" && node.info) line += ` info=${node.info}`;
    return line;
}

/** One node per line, children indented two spaces under their parent. */
export function formatAst(node: MarkdownNode, indent = 0): string {
    const lines = [`${"  ".repeat(indent)}${describeNode(node)}`];
    if (hasChildren(node)) {
        for (const child of node.children) {
            lines.push(formatAst(child, indent + 1));
        }
    }
    return lines.join("\n");
}
