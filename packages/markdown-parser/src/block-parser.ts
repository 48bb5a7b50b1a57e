import type {
  BlockNode,
  CodeBlockNode,
  DocumentNode,
  ListItemChild,
  ListItemNode,
  ListNode,
  ParagraphNode,
} from "./ast";
import {
  createBlockquoteNode,
  createBulletListNode,
  createCodeBlockNode,
  createDocumentNode,
  createHeadingNode,
  createListItemNode,
  createOrderedListNode,
  createParagraphNode,
  createThematicBreakNode,
} from "./ast";
import { silentTrace, type DebugTrace } from "./debug";
import { assembleInlineLines, parseInlineString } from "./inline-parser";
import {
  isBlankLine,
  isBlockquoteLine,
  isCodeFence,
  isIndented,
  isListItemOfFamily,
  isThematicBreak,
  parseAtxHeading,
  parseFenceInfo,
  parseListLine,
  splitLines,
  stripBlockquoteMarker,
  stripIndent,
  type ListFamily,
  type ListLine,
} from "./parser-helpers";

interface OpenFence {
  info?: string;
  lines: string[];
}

interface BlockState {
  blocks: BlockNode[];
  paragraph: string[];
  blockquote: string[];
  fence: OpenFence | null;
}

export interface ParsedList {
  node: ListNode;
  consumed: number;
}

export function blockPhase(markdown: string, trace: DebugTrace = silentTrace): DocumentNode {
  return createDocumentNode(parseBlocks(splitLines(markdown), trace));
}

export function parseBlocks(lines: string[], trace: DebugTrace = silentTrace): BlockNode[] {
  const state: BlockState = { blocks: [], paragraph: [], blockquote: [], fence: null };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    if (trace.enabled) {
      trace.log(`Line ${i}: "${line}"`);
    }

    if (isCodeFence(line)) {
      if (state.fence) {
        closeFence(state, trace);
      } else {
        closeTextBlocks(state, trace);
        state.fence = { info: parseFenceInfo(line), lines: [] };
      }
      i++;
      continue;
    }

    if (state.fence) {
      state.fence.lines.push(line);
      i++;
      continue;
    }

    const heading = parseAtxHeading(line);
    if (heading) {
      closeTextBlocks(state, trace);
      state.blocks.push(createHeadingNode(heading.level, assembleInlineLines([heading.text])));
      i++;
      continue;
    }

    if (isThematicBreak(line)) {
      closeTextBlocks(state, trace);
      state.blocks.push(createThematicBreakNode());
      i++;
      continue;
    }

    const listLine = parseListLine(line);
    if (listLine) {
      closeTextBlocks(state, trace);
      const { node, consumed } = parseList(lines.slice(i), listLine, trace);
      state.blocks.push(node);
      i += consumed;
      continue;
    }

    if (isBlockquoteLine(line)) {
      closeParagraph(state, trace);
      state.blockquote.push(stripBlockquoteMarker(line));
      i++;
      continue;
    }

    if (isBlankLine(line)) {
      closeTextBlocks(state, trace);
      i++;
      continue;
    }

    closeBlockquote(state, trace);
    state.paragraph.push(line);
    i++;
  }

  closeFence(state, trace);
  closeTextBlocks(state, trace);
  return state.blocks;
}

function closeFence(state: BlockState, trace: DebugTrace) {
  const fence = state.fence;
  if (!fence) return;
  if (trace.enabled) {
    trace.log(`Closing code block with ${fence.lines.length} line(s), info=${fence.info ?? "none"}`);
  }
  state.blocks.push(createCodeBlockNode(fence.lines.join("\n"), fence.info));
  state.fence = null;
}

function closeBlockquote(state: BlockState, trace: DebugTrace) {
  if (state.blockquote.length === 0) return;
  if (trace.enabled) {
    trace.log(`Closing blockquote with ${state.blockquote.length} line(s)`);
  }
  const paragraph = createParagraphNode(parseInlineString(state.blockquote.join(" ")));
  state.blocks.push(createBlockquoteNode(paragraph));
  state.blockquote = [];
}

function closeParagraph(state: BlockState, trace: DebugTrace) {
  if (state.paragraph.length === 0) return;
  if (trace.enabled) {
    trace.log(`Closing paragraph with ${state.paragraph.length} line(s)`);
  }
  state.blocks.push(createParagraphNode(assembleInlineLines(state.paragraph)));
  state.paragraph = [];
}

// Only one of the two is ever open at a time.
function closeTextBlocks(state: BlockState, trace: DebugTrace) {
  closeBlockquote(state, trace);
  closeParagraph(state, trace);
}

/**
 * Number of lines, starting at `lines[0]`, that belong to one list: items of
 * the same family, lines indented two or more columns, and blank lines that
 * lead into either.
 */
export function findListExtent(lines: string[], family: ListFamily): number {
  let end = 1;
  while (end < lines.length) {
    const line = lines[end];
    if (isListItemOfFamily(line, family) || isIndented(line)) {
      end++;
      continue;
    }
    const next = lines[end + 1];
    if (isBlankLine(line) && next !== undefined && (isListItemOfFamily(next, family) || isIndented(next))) {
      end++;
      continue;
    }
    break;
  }
  return end;
}

/**
 * Parses the list whose first item line is `lines[0]` and reports how many
 * lines it took.
 */
export function parseList(lines: string[], first: ListLine, trace: DebugTrace = silentTrace): ParsedList {
  const consumed = findListExtent(lines, first.family);
  if (trace.enabled) {
    trace.log(`List (${first.family}) spans ${consumed} line(s)`);
  }

  const items: ListItemNode[] = [];
  let marker: ListLine | null = first;
  let i = 0;
  while (marker && i < consumed) {
    const { item, next } = parseListItem(lines, i, consumed, marker, trace);
    items.push(item);
    i = next;
    marker = i < consumed ? parseListLine(lines[i]) : null;
  }

  const node = first.family === "ordered"
    ? createOrderedListNode(first.start, items)
    : createBulletListNode(items);
  return { node, consumed };
}

function parseListItem(
  lines: string[],
  start: number,
  end: number,
  marker: ListLine,
  trace: DebugTrace,
): { item: ListItemNode; next: number } {
  const content: string[] = [marker.content];
  let pendingBlanks: string[] = [];

  let i = start + 1;
  while (i < end && !isListItemOfFamily(lines[i], marker.family)) {
    const line = lines[i];
    if (isBlankLine(line)) {
      pendingBlanks.push("");
    } else {
      content.push(...pendingBlanks, stripIndent(line, marker.contentIndent));
      pendingBlanks = [];
    }
    i++;
  }

  if (trace.enabled) {
    trace.log(`List item at line ${start} collected ${content.length} line(s)`);
  }
  return { item: createListItemNode(parseListItemContent(content)), next: i };
}

function parseListItemContent(lines: string[]): ListItemChild[] {
  if (lines.length === 1) {
    return assembleInlineLines(lines);
  }
  if (!lines.some(isBlankLine)) {
    return [createParagraphNode(assembleInlineLines(lines))];
  }
  return parseItemBlocks(lines);
}

/**
 * Block pass for list items holding blank lines: only fences, blank-line
 * separated paragraphs and code.
 */
export function parseItemBlocks(lines: string[]): Array<ParagraphNode | CodeBlockNode> {
  const blocks: Array<ParagraphNode | CodeBlockNode> = [];
  let paragraph: string[] = [];
  let fence: OpenFence | null = null;

  const flushParagraph = () => {
    if (paragraph.length === 0) return;
    blocks.push(createParagraphNode(assembleInlineLines(paragraph)));
    paragraph = [];
  };

  for (const line of lines) {
    if (isCodeFence(line)) {
      if (fence) {
        blocks.push(createCodeBlockNode(fence.lines.join("\n"), fence.info));
        fence = null;
      } else {
        flushParagraph();
        fence = { info: parseFenceInfo(line), lines: [] };
      }
    } else if (fence) {
      fence.lines.push(line);
    } else if (isBlankLine(line)) {
      flushParagraph();
    } else {
      paragraph.push(line);
    }
  }

  if (fence) {
    blocks.push(createCodeBlockNode(fence.lines.join("\n"), fence.info));
  }
  flushParagraph();
  return blocks;
}
