import { test, describe, expect } from "vitest";
import { INLINE_RULES, parseInlineString } from "@/inline-parser";

describe("parseInlineString - code spans", () => {
    test("splits text around a code span", () => {
        expect(parseInlineString("Hello `dude`")).toEqual([
            { type: "text", literal: "Hello " },
            { type: "code", literal: "dude" },
        ]);
    });

    test("takes code spans before emphasis", () => {
        const nodes = parseInlineString("Hello `code` and **bold**");
        expect(nodes.map(n => n.type)).toEqual(["text", "code", "text", "strong"]);
        expect(nodes[1]).toEqual({ type: "code", literal: "code" });
    });

    test("handles several code spans in one run", () => {
        const nodes = parseInlineString("Multiple `code` spans `in` one sentence");
        expect(nodes.map(n => n.type)).toEqual(["text", "code", "text", "code", "text"]);
        expect(nodes[3]).toEqual({ type: "code", literal: "in" });
    });

    test("leaves an unterminated backtick as text", () => {
        expect(parseInlineString("`open code")).toEqual([{ type: "text", literal: "`open code" }]);
    });
});

describe("parseInlineString - autolinks and inline HTML", () => {
    test("parses a bare autolink", () => {
        expect(parseInlineString("<https://www.example.com>")).toEqual([
            {
                type: "autolink",
                destination: "https://www.example.com",
                children: [{ type: "text", literal: "https://www.example.com" }],
            },
        ]);
    });

    test("keeps surrounding text", () => {
        const nodes = parseInlineString("Visit <https://www.google.com> for search");
        expect(nodes.map(n => n.type)).toEqual(["text", "autolink", "text"]);
        expect(nodes[0]).toEqual({ type: "text", literal: "Visit " });
        expect(nodes[2]).toEqual({ type: "text", literal: " for search" });
    });

    test("parses several autolinks", () => {
        const nodes = parseInlineString("Check <http://example.com> and <https://other.com>");
        expect(nodes.map(n => n.type)).toEqual(["text", "autolink", "text", "autolink"]);
    });

    test("tells autolinks from HTML tags", () => {
        const nodes = parseInlineString("Link: <https://example.com> and HTML: <div>tag</div>");
        expect(nodes).toEqual([
            { type: "text", literal: "Link: " },
            {
                type: "autolink",
                destination: "https://example.com",
                children: [{ type: "text", literal: "https://example.com" }],
            },
            { type: "text", literal: " and HTML: " },
            { type: "html_inline", literal: "<div>" },
            { type: "text", literal: "tag" },
            { type: "html_inline", literal: "</div>" },
        ]);
    });

    test("keeps HTML tags verbatim", () => {
        expect(parseInlineString("This has <em>HTML</em> tags.")).toEqual([
            { type: "text", literal: "This has " },
            { type: "html_inline", literal: "<em>" },
            { type: "text", literal: "HTML" },
            { type: "html_inline", literal: "</em>" },
            { type: "text", literal: " tags." },
        ]);
    });

    test("ignores angle brackets that are not tag-shaped", () => {
        expect(parseInlineString("1 < 2 and 3 > 2")).toEqual([{ type: "text", literal: "1 < 2 and 3 > 2" }]);
    });

    test("defers earlier emphasis to a later HTML tag", () => {
        expect(parseInlineString("*em* <b>x</b>")).toEqual([
            { type: "emphasis", children: [{ type: "text", literal: "em" }] },
            { type: "html_inline", literal: "<b>" },
            { type: "text", literal: "x" },
            { type: "html_inline", literal: "</b>" },
        ]);
    });
});

describe("parseInlineString - emphasis", () => {
    test("parses strong and emphasis in one run", () => {
        expect(parseInlineString("This is **bold** and *italic* text.")).toEqual([
            { type: "text", literal: "This is " },
            { type: "strong", children: [{ type: "text", literal: "bold" }] },
            { type: "text", literal: " and " },
            { type: "emphasis", children: [{ type: "text", literal: "italic" }] },
            { type: "text", literal: " text." },
        ]);
    });

    test("drops whitespace-only text between matches", () => {
        expect(parseInlineString("**a** **b**")).toEqual([
            { type: "strong", children: [{ type: "text", literal: "a" }] },
            { type: "strong", children: [{ type: "text", literal: "b" }] },
        ]);
    });

    test("reads triple asterisks as strong between literal asterisks", () => {
        expect(parseInlineString("***text***")).toEqual([
            { type: "text", literal: "*" },
            { type: "strong", children: [{ type: "text", literal: "text" }] },
            { type: "text", literal: "*" },
        ]);
    });

    test("leaves an unterminated marker as text", () => {
        expect(parseInlineString("**not closed")).toEqual([{ type: "text", literal: "**not closed" }]);
    });

    test("does not nest underscores inside double underscores", () => {
        expect(parseInlineString("__bold _not nested_ bold__")).toEqual([
            { type: "strong", children: [{ type: "text", literal: "bold _not nested_ bold" }] },
        ]);
    });

    test("nests asterisk strong inside underscore emphasis", () => {
        expect(parseInlineString("_italic with **bold** inside_")).toEqual([
            {
                type: "emphasis",
                children: [
                    { type: "text", literal: "italic with " },
                    { type: "strong", children: [{ type: "text", literal: "bold" }] },
                    { type: "text", literal: " inside" },
                ],
            },
        ]);
    });

    test("keeps asterisk tiers when an underscore span crosses their delimiters", () => {
        expect(parseInlineString("*x _y* **z** w_")).toEqual([
            { type: "emphasis", children: [{ type: "text", literal: "x _y" }] },
            { type: "strong", children: [{ type: "text", literal: "z" }] },
            { type: "text", literal: " w_" },
        ]);
    });

    test("nests underscore strong inside asterisk emphasis", () => {
        expect(parseInlineString("*text __bold__ text*")).toEqual([
            {
                type: "emphasis",
                children: [
                    { type: "text", literal: "text " },
                    { type: "strong", children: [{ type: "text", literal: "bold" }] },
                    { type: "text", literal: " text" },
                ],
            },
        ]);
    });

    test("reads triple underscores as strong wrapping emphasis", () => {
        expect(parseInlineString("___text___")).toEqual([
            { type: "strong", children: [{ type: "emphasis", children: [{ type: "text", literal: "text" }] }] },
        ]);
    });

    test("ignores underscores inside words", () => {
        expect(parseInlineString("snake_case_name")).toEqual([{ type: "text", literal: "snake_case_name" }]);
        expect(parseInlineString("use my_var and _real_ emphasis")).toEqual([
            { type: "text", literal: "use my_var and " },
            { type: "emphasis", children: [{ type: "text", literal: "real" }] },
            { type: "text", literal: " emphasis" },
        ]);
    });
});

describe("parseInlineString - links and images", () => {
    test("parses a link", () => {
        expect(parseInlineString("[Google](https://google.com)")).toEqual([
            { type: "link", destination: "https://google.com", children: [{ type: "text", literal: "Google" }] },
        ]);
    });

    test("keeps text around a link", () => {
        const nodes = parseInlineString("Visit [Google](https://google.com) for search.");
        expect(nodes.map(n => n.type)).toEqual(["text", "link", "text"]);
    });

    test("scans the link label", () => {
        expect(parseInlineString("[_em_ label](/x)")).toEqual([
            {
                type: "link",
                destination: "/x",
                children: [
                    { type: "emphasis", children: [{ type: "text", literal: "em" }] },
                    { type: "text", literal: " label" },
                ],
            },
        ]);
    });

    test("lets asterisk strong in a label win over the link", () => {
        expect(parseInlineString("[**bold** label](/x)")).toEqual([
            { type: "text", literal: "[" },
            { type: "strong", children: [{ type: "text", literal: "bold" }] },
            { type: "text", literal: " label](/x)" },
        ]);
    });

    test("parses an image with and without a title", () => {
        expect(parseInlineString("![Image](pic.jpg)")).toEqual([
            { type: "image", destination: "pic.jpg", children: [{ type: "text", literal: "Image" }] },
        ]);
        expect(parseInlineString('![Alt](a.png "A title")')).toEqual([
            { type: "image", destination: "a.png", title: "A title", children: [{ type: "text", literal: "Alt" }] },
        ]);
    });

    test("accepts empty alt text", () => {
        expect(parseInlineString("![](empty.png)")).toEqual([
            { type: "image", destination: "empty.png", children: [{ type: "text", literal: "" }] },
        ]);
    });

    test("takes images before links", () => {
        const nodes = parseInlineString("![Image](pic.jpg) and [Link](page.html)");
        expect(nodes.map(n => n.type)).toEqual(["image", "text", "link"]);
    });
});

describe("INLINE_RULES", () => {
    test("lists tiers in priority order", () => {
        expect(INLINE_RULES.map(r => r.name)).toEqual([
            "autolink",
            "html_inline",
            "code",
            "strong",
            "emphasis",
            "image",
            "link",
            "strong_emphasis_underscore",
            "strong_underscore",
            "emphasis_underscore",
        ]);
    });
});

describe("parseInlineString - blank input", () => {
    test("returns no nodes", () => {
        expect(parseInlineString("")).toEqual([]);
        expect(parseInlineString("   ")).toEqual([]);
    });
});
