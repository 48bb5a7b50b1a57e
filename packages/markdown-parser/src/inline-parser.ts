import type { InlineNode } from "./ast";
import {
  createAutolinkNode,
  createCodeNode,
  createEmphasisNode,
  createHardBreakNode,
  createHtmlInlineNode,
  createImageNode,
  createLinkNode,
  createSoftBreakNode,
  createStrongNode,
  createTextNode,
} from "./ast";
import { countTrailingSpaces } from "./parser-helpers";

export type DelimiterFamily = "asterisk" | "underscore";

type ScanFn = (text: string) => InlineNode[];

export interface InlineRule {
  name: string;
  pattern: RegExp;
  family?: DelimiterFamily;
  build(match: RegExpMatchArray, scan: ScanFn): InlineNode;
}

// An underscore touching a letter or digit on its outer side is part of a word.
const WORD_BEFORE = "(?<![A-Za-z0-9_])";
const WORD_AFTER = "(?![A-Za-z0-9_])";

/**
 * Inline tiers in priority order. A tier is tried against the whole span
 * before the next one is considered, so an earlier tier always wins even
 * when a later tier's match starts further left.
 */
export const INLINE_RULES: readonly InlineRule[] = [
  {
    name: "autolink",
    pattern: /<([A-Za-z][A-Za-z0-9+.-]*:\/\/[^\s<>]+)>/,
    build: (m) => createAutolinkNode(m[1]),
  },
  {
    name: "html_inline",
    pattern: /<\/?[A-Za-z][^<>]*>/,
    build: (m) => createHtmlInlineNode(m[0]),
  },
  {
    name: "code",
    pattern: /`([^`]+)`/,
    build: (m) => createCodeNode(m[1]),
  },
  {
    name: "strong",
    family: "asterisk",
    pattern: /\*\*([^*]+)\*\*/,
    build: (m, scan) => createStrongNode(scan(m[1])),
  },
  {
    name: "emphasis",
    family: "asterisk",
    pattern: /(?<!\*)\*([^*]+)\*(?!\*)/,
    build: (m, scan) => createEmphasisNode(scan(m[1])),
  },
  {
    name: "image",
    pattern: /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"([^"]*)")?\)/,
    build: (m) => createImageNode(m[2], m[1], m[3]),
  },
  {
    name: "link",
    pattern: /\[([^\]]+)\]\(([^)]+)\)/,
    build: (m, scan) => createLinkNode(m[2].trim(), scan(m[1])),
  },
  {
    name: "strong_emphasis_underscore",
    family: "underscore",
    pattern: new RegExp(`${WORD_BEFORE}___(?![_\\s])([^_]+?)(?<!\\s)___${WORD_AFTER}`),
    build: (m, scan) => createStrongNode([createEmphasisNode(scan(m[1]))]),
  },
  {
    name: "strong_underscore",
    family: "underscore",
    pattern: new RegExp(`${WORD_BEFORE}__(?![_\\s])(.+?)(?<!\\s)__${WORD_AFTER}`),
    build: (m, scan) => createStrongNode(scan(m[1])),
  },
  {
    name: "emphasis_underscore",
    family: "underscore",
    pattern: new RegExp(`${WORD_BEFORE}_(?![_\\s])([^_]+?)(?<!\\s)_${WORD_AFTER}`),
    build: (m, scan) => createEmphasisNode(scan(m[1])),
  },
];

interface RuleMatch {
  rule: InlineRule;
  match: RegExpMatchArray;
  start: number;
  end: number;
}

function toRuleMatch(rule: InlineRule, match: RegExpMatchArray): RuleMatch {
  const start = match.index ?? 0;
  return { rule, match, start, end: start + match[0].length };
}

function matchesOfFamily(text: string, family: DelimiterFamily): RuleMatch[] {
  const found: RuleMatch[] = [];
  for (const rule of INLINE_RULES) {
    if (rule.family !== family) continue;
    for (const candidate of text.matchAll(new RegExp(rule.pattern.source, "g"))) {
      found.push(toRuleMatch(rule, candidate));
    }
  }
  return found;
}

/** True when some match of `family` starts on one side of `span` and ends inside it, or the reverse. */
function crossesFamily(text: string, span: RuleMatch, family: DelimiterFamily): boolean {
  return matchesOfFamily(text, family).some(
    (m) =>
      (m.start < span.start && m.end > span.start && m.end < span.end) ||
      (m.start > span.start && m.start < span.end && m.end > span.end),
  );
}

/**
 * Emphasis of one family nested inside emphasis of the other would lose its
 * outer span to the higher tier, so an enclosing match of the other family
 * takes over. It only does so when it nests cleanly: a span that cuts
 * through a match of the inner family leaves the higher tier in charge.
 */
function findEnclosingMatch(
  text: string,
  inner: RuleMatch,
  family: DelimiterFamily,
  disabled: ReadonlySet<DelimiterFamily>,
): RuleMatch | null {
  if (disabled.has(family)) return null;
  const innerFamily = inner.rule.family;
  for (const outer of matchesOfFamily(text, family)) {
    if (outer.start > inner.start || outer.end < inner.end) continue;
    if (innerFamily && crossesFamily(text, outer, innerFamily)) continue;
    return outer;
  }
  return null;
}

function findFirstMatch(text: string, disabled: ReadonlySet<DelimiterFamily>): RuleMatch | null {
  for (const rule of INLINE_RULES) {
    if (rule.family && disabled.has(rule.family)) continue;
    const match = text.match(rule.pattern);
    if (!match) continue;
    const found = toRuleMatch(rule, match);
    if (rule.family === "asterisk") {
      return findEnclosingMatch(text, found, "underscore", disabled) ?? found;
    }
    return found;
  }
  return null;
}

/**
 * Scans one text run into inline nodes. The first rule that matches anywhere
 * in the run splits it into before/match/after; the outer pieces are scanned
 * again and dropped when blank.
 */
export function scanInline(
  text: string,
  disabled: ReadonlySet<DelimiterFamily> = new Set(),
): InlineNode[] {
  if (!text.trim()) return [];

  const found = findFirstMatch(text, disabled);
  if (!found) return [createTextNode(text)];

  const { rule, match, start, end } = found;
  const before = text.slice(0, start);
  const after = text.slice(end);

  // A family never nests inside itself.
  const innerDisabled = rule.family ? new Set([...disabled, rule.family]) : disabled;
  const node = rule.build(match, (inner) => scanInline(inner, innerDisabled));

  return [...scanInline(before, disabled), node, ...scanInline(after, disabled)];
}

export function parseInlineString(input: string): InlineNode[] {
  return scanInline(input);
}

/**
 * Joins the lines of one paragraph. Every line but the last ends in a
 * hardbreak when it had two or more trailing spaces, else a softbreak.
 */
export function assembleInlineLines(lines: string[]): InlineNode[] {
  const nodes: InlineNode[] = [];
  lines.forEach((line, i) => {
    nodes.push(...parseInlineString(line.trimEnd()));
    if (i === lines.length - 1) return;
    nodes.push(countTrailingSpaces(line) >= 2 ? createHardBreakNode() : createSoftBreakNode());
  });
  return nodes;
}
