import { ManifestError } from "./errors.js";
import { isPageKind, type SymbolHost } from "./host.js";
import {
  createReferenceResolver,
  type DocInfo,
  type ReferenceResolver,
} from "./references.js";
import type { GuideRef } from "./schema.js";

export interface ParserConfigOptions<S> {
  index: ReadonlyMap<string, S>;
  host: SymbolHost<S>;
  duplicateOf?: ReadonlyMap<string, string>;
  tree?: ReadonlyMap<string, readonly string[]>;
  docIndex?: ReadonlyMap<string, DocInfo>;
  guideIndex?: ReadonlyMap<string, readonly GuideRef[]>;
  moduleNames?: readonly string[];
  /** Leading parameter names dropped from signatures. Default: ["self"] */
  receiverNames?: readonly string[];
  /** Child names never documented on class or module pages. */
  hiddenMembers?: Iterable<string>;
  /** Restricts which keywords open a docstring detail section. */
  detailKeywords?: readonly string[];
  onWarning?: (message: string) => void;
}

/** Everything a generation run reads. Built once, never mutated. */
export interface ParserConfig<S> {
  readonly index: ReadonlyMap<string, S>;
  readonly host: SymbolHost<S>;
  readonly duplicateOf: ReadonlyMap<string, string>;
  /** Canonical name → every alias of it, sorted. */
  readonly duplicates: ReadonlyMap<string, readonly string[]>;
  readonly tree: ReadonlyMap<string, readonly string[]>;
  readonly guideIndex: ReadonlyMap<string, readonly GuideRef[]>;
  readonly referenceResolver: ReferenceResolver<S>;
  readonly receiverNames: readonly string[];
  readonly hiddenMembers: ReadonlySet<string>;
  readonly detailKeywords?: readonly string[];
  readonly onWarning?: (message: string) => void;
  /** Whether the (canonical) name is documented on a page of its own. */
  hasPage(fullName: string): boolean;
}

function parentName(fullName: string): string | undefined {
  const dot = fullName.lastIndexOf(".");
  return dot === -1 ? undefined : fullName.slice(0, dot);
}

export function reverseDuplicates(
  duplicateOf: ReadonlyMap<string, string>
): Map<string, string[]> {
  const duplicates = new Map<string, string[]>();
  for (const [alias, master] of duplicateOf) {
    let aliases = duplicates.get(master);
    if (!aliases) {
      aliases = [];
      duplicates.set(master, aliases);
    }
    aliases.push(alias);
  }
  for (const aliases of duplicates.values()) {
    aliases.sort();
  }
  return duplicates;
}

export function createParserConfig<S>(
  options: ParserConfigOptions<S>
): ParserConfig<S> {
  const { index, host } = options;
  const duplicateOf = options.duplicateOf ?? new Map<string, string>();

  for (const [alias, master] of duplicateOf) {
    if (!index.has(master)) {
      throw new ManifestError(`Duplicate "${alias}" points at "${master}", which is not in the symbol index`);
    }
    if (duplicateOf.has(master)) {
      throw new ManifestError(`Duplicate "${alias}" points at "${master}", which is itself an alias`);
    }
  }

  // Members of classes (methods, properties) are documented on the class page.
  function symbolHasPage(fullName: string, symbol: S): boolean {
    const kind = host.classify(symbol);
    if (!isPageKind(kind)) return false;
    if (kind === "class") return true;
    const parent = parentName(fullName);
    const parentSymbol = parent === undefined ? undefined : index.get(parent);
    return parentSymbol === undefined || host.classify(parentSymbol) !== "class";
  }

  const referenceResolver = createReferenceResolver({
    index,
    duplicateOf,
    docIndex: options.docIndex ?? new Map<string, DocInfo>(),
    moduleNames: options.moduleNames,
    hasPage: symbolHasPage,
  });

  return {
    index,
    host,
    duplicateOf,
    duplicates: reverseDuplicates(duplicateOf),
    tree: options.tree ?? new Map<string, readonly string[]>(),
    guideIndex: options.guideIndex ?? new Map<string, readonly GuideRef[]>(),
    referenceResolver,
    receiverNames: options.receiverNames ?? ["self"],
    hiddenMembers: new Set(options.hiddenMembers ?? []),
    detailKeywords: options.detailKeywords,
    onWarning: options.onWarning,
    hasPage(fullName: string): boolean {
      const symbol = index.get(fullName);
      return symbol !== undefined && symbolHasPage(fullName, symbol);
    },
  };
}
