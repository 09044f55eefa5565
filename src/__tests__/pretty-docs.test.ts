import { describe, it, expect } from "vitest";
import { structureDocstring } from "../docstring.js";
import { UnknownPageKindError } from "../errors.js";
import type { ClassPageInfo, MemberInfo, ModulePageInfo } from "../page-info.js";
import { renderDefinedIn, renderPage } from "../pretty-docs.js";
import type { SymbolKind } from "../schema.js";

// -- fixtures ---------------------------------------------------------------

function makeMember(
  shortName: string,
  kind: SymbolKind,
  overrides: Partial<MemberInfo<string>> = {}
): MemberInfo<string> {
  return {
    shortName,
    fullName: `lib.${shortName}`,
    symbol: shortName,
    kind,
    doc: structureDocstring(""),
    isLinkable: false,
    ...overrides,
  };
}

// -- function pages -----------------------------------------------------------

describe("renderPage for functions", () => {
  it("renders header, aliases, location, docstring, details and compatibility", () => {
    const doc = structureDocstring("Adds numbers.\n\nArgs:\n  a: first\n  b: second\n");
    const markdown = renderPage({
      kind: "function",
      fullName: "lib.add",
      aliases: ["lib.plus"],
      definedIn: { path: "lib/add.py", url: "https://example.com/lib/add.py" },
      guides: "",
      doc: { ...doc, compatibility: { zeta: "Z note.\n", alpha: "A note.\n" } },
      signature: "(a, b)",
    });

    expect(markdown).toBe(
      "# lib.add(a, b)\n\n" +
        "### `lib.plus(a, b)`\n" +
        "\n" +
        "\n\n" +
        "Defined in [`lib/add.py`](https://example.com/lib/add.py).\n\n" +
        "Adds numbers.\n\n" +
        "#### Args:\n\n" +
        "* **a**: first\n" +
        "* **b**: second\n" +
        "\n\n#### alpha compatibility\nA note.\n\n" +
        "\n\n#### zeta compatibility\nZ note.\n\n"
    );
  });

  it("separates detail sections with a newline", () => {
    const doc = structureDocstring("Brief.\n\nArgs:\n  x: an x\nReturns:\n  Nothing.\n");
    const markdown = renderPage({
      kind: "function",
      fullName: "f",
      aliases: [],
      guides: "See the guide: [G](../../g.md)\n\n",
      doc,
      signature: "(x)",
    });

    expect(markdown).toBe(
      "# f(x)\n\n" +
        "See the guide: [G](../../g.md)\n\n" +
        "Brief.\n\n" +
        "#### Args:\n\n* **x**: an x\n" +
        "\n" +
        "#### Returns:\n\n  Nothing.\n"
    );
  });
});

// -- class pages --------------------------------------------------------------

describe("renderPage for classes", () => {
  const page: ClassPageInfo<string> = {
    kind: "class",
    fullName: "lib.Thing",
    aliases: ["lib.Widget"],
    guides: "",
    doc: structureDocstring("A thing."),
    methods: [
      makeMember("zeta", "function", { signature: "()" }),
      makeMember("alpha", "function", {
        signature: "(x)",
        doc: structureDocstring("Alpha method."),
      }),
    ],
    properties: [makeMember("size", "property", { doc: structureDocstring("Size.") })],
    classes: [
      makeMember("Outer", "class", { url: "./lib/Thing/Outer.md", isLinkable: true }),
      makeMember("Inner", "class", { url: "./lib/Thing/Inner.md", isLinkable: true }),
    ],
    otherMembers: [makeMember("B_CONST", "other"), makeMember("A_CONST", "other")],
  };

  it("renders every section with members sorted by short name", () => {
    expect(renderPage(page)).toBe(
      "# lib.Thing\n\n" +
        "### `class lib.Widget`\n" +
        "\n" +
        "A thing." +
        "\n\n" +
        "## Child Classes\n" +
        "[`class Inner`](./lib/Thing/Inner.md)\n\n" +
        "[`class Outer`](./lib/Thing/Outer.md)\n\n" +
        "## Properties\n\n" +
        '<h3 id="size"><code>size</code></h3>\n\n' +
        "Size." +
        "\n\n" +
        "\n\n" +
        "## Methods\n\n" +
        '<h3 id="alpha"><code>alpha(x)</code></h3>\n\n' +
        "Alpha method." +
        "\n\n" +
        '<h3 id="zeta"><code>zeta()</code></h3>\n\n' +
        "\n\n" +
        "\n\n" +
        "## Class Members\n\n" +
        '<h3 id="A_CONST"><code>A_CONST</code></h3>\n\n' +
        '<h3 id="B_CONST"><code>B_CONST</code></h3>\n\n'
    );
  });

  it("does not reorder the page model", () => {
    renderPage(page);
    expect(page.methods.map((m) => m.shortName)).toEqual(["zeta", "alpha"]);
  });

  it("omits empty member sections", () => {
    const bare: ClassPageInfo<string> = {
      ...page,
      aliases: [],
      methods: [],
      properties: [],
      classes: [],
      otherMembers: [],
    };
    expect(renderPage(bare)).toBe("# lib.Thing\n\nA thing.\n\n");
  });
});

// -- module pages -------------------------------------------------------------

describe("renderPage for modules", () => {
  it("lists members in model order with kind suffixes and briefs", () => {
    const page: ModulePageInfo<string> = {
      kind: "module",
      fullName: "lib",
      aliases: ["alias_lib"],
      definedIn: { path: "lib/__init__.py" },
      guides: "",
      doc: structureDocstring("The library.\n"),
      members: [
        makeMember("sub", "module", {
          url: "./lib/sub.md",
          isLinkable: true,
          doc: structureDocstring("Submodule brief.\n\nMore."),
        }),
        makeMember("Thing", "class", { url: "./lib/Thing.md", isLinkable: true }),
        makeMember("add", "function", {
          url: "./lib/add.md",
          isLinkable: true,
          doc: structureDocstring("Adds."),
        }),
        makeMember("VERSION", "other"),
      ],
    };

    expect(renderPage(page)).toBe(
      "# Module: lib\n\n" +
        "### Module `alias_lib`\n" +
        "\n" +
        "\n\n" +
        "Defined in `lib/__init__.py`.\n\n" +
        "The library.\n" +
        "\n\n" +
        "## Members\n\n" +
        "[`sub`](./lib/sub.md) module: Submodule brief.\n\n" +
        "[`class Thing`](./lib/Thing.md)\n\n" +
        "[`add(...)`](./lib/add.md): Adds.\n\n" +
        "Constant VERSION"
    );
  });

  it("renders an empty member list", () => {
    const page: ModulePageInfo<string> = {
      kind: "module",
      fullName: "empty",
      aliases: [],
      guides: "",
      doc: structureDocstring("Nothing here."),
      members: [],
    };
    expect(renderPage(page)).toBe("# Module: empty\n\nNothing here.\n\n## Members\n\n");
  });
});

describe("renderPage contract", () => {
  it("throws on an unknown page kind", () => {
    const bogus = JSON.parse('{"kind":"table","fullName":"x"}');
    expect(() => renderPage(bogus)).toThrow(UnknownPageKindError);
  });
});

describe("renderDefinedIn", () => {
  it("links the path when a url is known", () => {
    expect(renderDefinedIn({ path: "a/b.py", url: "https://example.com/a/b.py" })).toBe(
      "Defined in [`a/b.py`](https://example.com/a/b.py).\n\n"
    );
  });

  it("quotes the bare path otherwise", () => {
    expect(renderDefinedIn({ path: "a/b.py" })).toBe("Defined in `a/b.py`.\n\n");
  });
});
