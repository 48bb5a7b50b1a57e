import { isHeadingLevel, type HeadingLevel } from "./ast";

export type ListFamily = "bullet" | "ordered";

export interface ListLine {
  family: ListFamily;
  start: number;
  /** Width of the marker as printed, plus its trailing space. */
  contentIndent: number;
  content: string;
}

export interface AtxHeadingLine {
  level: HeadingLevel;
  text: string;
}

export function normalizeLineEndings(markdown: string): string {
  return markdown.replace(/\r\n?/g, "\n");
}

export function splitLines(markdown: string): string[] {
  return normalizeLineEndings(markdown).split("\n");
}

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

export function indentWidth(line: string): number {
  return line.match(/^[ \t]*/)?.[0].length ?? 0;
}

export function isIndented(line: string, columns = 2): boolean {
  return !isBlankLine(line) && indentWidth(line) >= columns;
}

/** Removes up to `columns` characters of leading whitespace. */
export function stripIndent(line: string, columns: number): string {
  return line.slice(Math.min(columns, indentWidth(line)));
}

export function isCodeFence(line: string): boolean {
  return line.startsWith("```");
}

export function parseFenceInfo(line: string): string | undefined {
  const info = line.slice(3).trim();
  return info || undefined;
}

export function parseAtxHeading(line: string): AtxHeadingLine | null {
  const m = line.match(/^(#{1,6})\s+(.*)$/);
  if (!m) return null;
  const level = m[1].length;
  if (!isHeadingLevel(level)) return null;
  return { level, text: m[2] };
}

export function isThematicBreak(line: string): boolean {
  return /^([*\-_])(?: ?\1){2,}$/.test(line.trim());
}

export function parseListLine(line: string): ListLine | null {
  if (isThematicBreak(line)) return null;

  const mBullet = line.match(/^\s*([-*+])\s+(.*)$/);
  if (mBullet) {
    return {
      family: "bullet",
      start: 1,
      contentIndent: mBullet[1].length + 1,
      content: mBullet[2],
    };
  }

  const mOrd = line.match(/^\s*(\d{1,9})\.\s+(.*)$/);
  if (mOrd) {
    return {
      family: "ordered",
      start: parseInt(mOrd[1], 10),
      contentIndent: mOrd[1].length + 2,
      content: mOrd[2],
    };
  }

  return null;
}

export function isListItemOfFamily(line: string, family: ListFamily): boolean {
  return parseListLine(line)?.family === family;
}

export function isBlockquoteLine(line: string): boolean {
  return line.startsWith(">");
}

export function stripBlockquoteMarker(line: string): string {
  return line.replace(/^>\s?/, "").trim();
}

export function countTrailingSpaces(line: string): number {
  return line.match(/ *$/)?.[0].length ?? 0;
}
