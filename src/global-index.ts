import { isPageKind, type SymbolHost } from "./host.js";
import type { ReferenceResolver } from "./references.js";

/**
 * Lists every module, class and function of the library, aliases included,
 * sorted by full name. Methods (functions whose parent is a class) and
 * properties are left out.
 */
export function buildGlobalIndex<S>(
  libraryName: string,
  index: ReadonlyMap<string, S>,
  resolver: ReferenceResolver<S>,
  host: SymbolHost<S>
): string {
  const symbolLinks: Array<[fullName: string, link: string]> = [];

  for (const [fullName, symbol] of index) {
    const kind = host.classify(symbol);
    if (!isPageKind(kind)) continue;

    if (kind === "function") {
      const dot = fullName.lastIndexOf(".");
      const parent = dot === -1 ? undefined : index.get(fullName.slice(0, dot));
      if (parent !== undefined && host.classify(parent) === "class") continue;
    }

    symbolLinks.push([fullName, resolver.symbolLink(fullName, fullName, ".")]);
  }

  symbolLinks.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const lines = [`# All symbols in ${libraryName}`, ""];
  for (const [, link] of symbolLinks) {
    lines.push(`*  ${link}`);
  }
  return lines.join("\n");
}
