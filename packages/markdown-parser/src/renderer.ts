import type { MarkdownNode } from "./ast";

function renderChildren(children: MarkdownNode[]): string {
  return children.map((c) => renderAstToHtml(c)).join("");
}

/**
 * Text, code and attribute values are written as they are; nothing is
 * escaped.
 */
export function renderAstToHtml(node: MarkdownNode): string {
  switch (node.type) {
    case "document":
      return node.children.map((c) => renderAstToHtml(c)).join("\n");
    case "paragraph":
      return `<p>${renderChildren(node.children)}</p>`;
    case "heading":
      return `<h${node.level}>${renderChildren(node.children)}</h${node.level}>`;
    case "blockquote":
      return `<blockquote>${renderChildren(node.children)}</blockquote>`;
    case "code_block": {
      const lang = node.info ? ` class="language-${node.info}"` : "";
      return `<pre><code${lang}>${node.literal}</code></pre>`;
    }
    case "bullet_list":
      return `<ul>${renderChildren(node.children)}</ul>`;
    case "ordered_list": {
      const startAttr = node.start !== 1 ? ` start="${node.start}"` : "";
      return `<ol${startAttr}>${renderChildren(node.children)}</ol>`;
    }
    case "list_item":
      return `<li>${renderChildren(node.children)}</li>`;
    case "thematic_break":
      return "<hr />";
    case "text":
      return node.literal;
    case "emphasis":
      return `<em>${renderChildren(node.children)}</em>`;
    case "strong":
      return `<strong>${renderChildren(node.children)}</strong>`;
    case "code":
      return `<code>${node.literal}</code>`;
    case "softbreak":
      return "\n";
    case "hardbreak":
      return "<br />";
    case "html_inline":
      return node.literal;
    case "autolink":
      return `<a href="${node.destination}">${node.destination}</a>`;
    case "link":
      return `<a href="${node.destination}">${renderChildren(node.children)}</a>`;
    case "image": {
      const t = node.title !== undefined ? ` title="${node.title}"` : "";
      return `<img src="${node.destination}" alt="${node.children[0].literal}"${t} />`;
    }
  }
}
