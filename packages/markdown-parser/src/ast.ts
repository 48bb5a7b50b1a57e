type NodeBase<T extends string> = { type: T }
type NodeWithChildren<T extends string, U extends MarkdownNode[]> = NodeBase<T> & { children: U }
type NodeWithLiteral<T extends string> = NodeBase<T> & { literal: string }
type NodeWithDestination<T extends string, U extends MarkdownNode[]> = NodeWithChildren<T, U> & {
  destination: string
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

export type DocumentNode = NodeWithChildren<"document", BlockNode[]>
export type ParagraphNode = NodeWithChildren<"paragraph", InlineNode[]>
export type HeadingNode = NodeWithChildren<"heading", InlineNode[]> & { level: HeadingLevel }
export type BlockquoteNode = NodeWithChildren<"blockquote", [ParagraphNode]>
export type CodeBlockNode = NodeWithLiteral<"code_block"> & { info?: string }
export type BulletListNode = NodeWithChildren<"bullet_list", ListItemNode[]>
export type OrderedListNode = NodeWithChildren<"ordered_list", ListItemNode[]> & { start: number }
export type ListItemNode = NodeWithChildren<"list_item", ListItemChild[]>
export type ThematicBreakNode = NodeBase<"thematic_break">

export type TextNode = NodeWithLiteral<"text">
export type EmphasisNode = NodeWithChildren<"emphasis", InlineNode[]>
export type StrongNode = NodeWithChildren<"strong", InlineNode[]>
export type CodeNode = NodeWithLiteral<"code">
export type SoftBreakNode = NodeBase<"softbreak">
export type HardBreakNode = NodeBase<"hardbreak">
export type HtmlInlineNode = NodeWithLiteral<"html_inline">
export type AutolinkNode = NodeWithDestination<"autolink", [TextNode]>
export type ImageNode = NodeWithDestination<"image", [TextNode]> & { title?: string }
export type LinkNode = NodeWithDestination<"link", InlineNode[]>

export type ListNode = BulletListNode | OrderedListNode

export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | BlockquoteNode
  | CodeBlockNode
  | BulletListNode
  | OrderedListNode
  | ThematicBreakNode

export type InlineNode =
  | TextNode
  | EmphasisNode
  | StrongNode
  | CodeNode
  | SoftBreakNode
  | HardBreakNode
  | HtmlInlineNode
  | AutolinkNode
  | ImageNode
  | LinkNode

// A tight single-line item holds its inline nodes directly.
export type ListItemChild = ParagraphNode | CodeBlockNode | InlineNode

export type MarkdownNode = DocumentNode | BlockNode | ListItemNode | InlineNode

export type NodeType = MarkdownNode["type"]

export function isHeadingLevel(n: number): n is HeadingLevel {
  return Number.isInteger(n) && n >= 1 && n <= 6
}

export function isNodeOfType<T extends NodeType>(
  node: MarkdownNode,
  type: T,
): node is Extract<MarkdownNode, { type: T }> {
  return node.type === type
}

export function hasChildren(node: MarkdownNode): node is Extract<MarkdownNode, { children: MarkdownNode[] }> {
  return "children" in node
}

export function createDocumentNode(children: BlockNode[] = []): DocumentNode {
  return { type: "document", children }
}

export function createParagraphNode(children: InlineNode[]): ParagraphNode {
  return { type: "paragraph", children }
}

export function createHeadingNode(level: HeadingLevel, children: InlineNode[]): HeadingNode {
  return { type: "heading", level, children }
}

export function createBlockquoteNode(paragraph: ParagraphNode): BlockquoteNode {
  return { type: "blockquote", children: [paragraph] }
}

export function createCodeBlockNode(literal: string, info?: string): CodeBlockNode {
  return info ? { type: "code_block", literal, info } : { type: "code_block", literal }
}

export function createBulletListNode(children: ListItemNode[]): BulletListNode {
  return { type: "bullet_list", children }
}

/**
 * Ordinals below 1 are clamped so the rendered `start` attribute is never
 * zero or negative.
 */
export function createOrderedListNode(start: number, children: ListItemNode[]): OrderedListNode {
  return { type: "ordered_list", start: Math.max(1, start), children }
}

export function createListItemNode(children: ListItemChild[]): ListItemNode {
  return { type: "list_item", children }
}

export function createThematicBreakNode(): ThematicBreakNode {
  return { type: "thematic_break" }
}

export function createTextNode(literal: string): TextNode {
  return { type: "text", literal }
}

export function createEmphasisNode(children: InlineNode[]): EmphasisNode {
  return { type: "emphasis", children }
}

export function createStrongNode(children: InlineNode[]): StrongNode {
  return { type: "strong", children }
}

export function createCodeNode(literal: string): CodeNode {
  return { type: "code", literal }
}

export function createSoftBreakNode(): SoftBreakNode {
  return { type: "softbreak" }
}

export function createHardBreakNode(): HardBreakNode {
  return { type: "hardbreak" }
}

export function createHtmlInlineNode(literal: string): HtmlInlineNode {
  return { type: "html_inline", literal }
}

export function createAutolinkNode(destination: string): AutolinkNode {
  return { type: "autolink", destination, children: [createTextNode(destination)] }
}

export function createImageNode(destination: string, alt: string, title?: string): ImageNode {
  const node: ImageNode = { type: "image", destination, children: [createTextNode(alt)] }
  if (title !== undefined) node.title = title
  return node
}

export function createLinkNode(destination: string, children: InlineNode[]): LinkNode {
  return { type: "link", destination, children }
}
