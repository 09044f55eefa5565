import { UnresolvedReferenceError } from "./errors.js";
import { documentUrl, documentationPath, joinUrl } from "./paths.js";

export interface DocInfo {
  title: string;
  url: string;
}

export interface ReferenceResolverOptions<S> {
  index: ReadonlyMap<string, S>;
  duplicateOf: ReadonlyMap<string, string>;
  docIndex: ReadonlyMap<string, DocInfo>;
  /** Top-level names a symbol reference must start with. Empty accepts any name. */
  moduleNames?: readonly string[];
  /**
   * Whether an indexed symbol is documented on a page of its own. Links to
   * symbols without one point at an anchor on their parent's page.
   * Default: every indexed symbol has a page.
   */
  hasPage?: (fullName: string, symbol: S) => boolean;
}

export interface ReferenceResolver<S> {
  /** Rewrites every `@{...}` token in `text`; throws on the first unresolved one. */
  replaceReferences(text: string, relativeRoot: string): string;
  /** Resolves a single token, with or without its `@{` `}` delimiters. */
  resolveReference(token: string, relativeRoot: string): string;
  referenceToUrl(fullName: string, relativeRoot: string): string;
  symbolLink(
    linkText: string,
    fullName: string,
    relativeRoot: string,
    codeRef?: boolean
  ): string;
  canonicalName(fullName: string): string;
  hasSymbol(fullName: string): boolean;
  lookup(fullName: string): S | undefined;
}

const REFERENCE_RE = /@\{([^}]+)\}/g;
const TOKEN_RE = /^@\{([^}]+)\}$/;

export function createReferenceResolver<S>(
  options: ReferenceResolverOptions<S>
): ReferenceResolver<S> {
  const { index, duplicateOf, docIndex } = options;
  const moduleNames = options.moduleNames ?? [];
  const hasPage = options.hasPage ?? (() => true);

  function canonicalName(fullName: string): string {
    return duplicateOf.get(fullName) ?? fullName;
  }

  function hasSymbol(fullName: string): boolean {
    return index.has(canonicalName(fullName));
  }

  function lookup(fullName: string): S | undefined {
    return index.get(canonicalName(fullName));
  }

  function tryUrl(fullName: string, relativeRoot: string): string | undefined {
    const master = canonicalName(fullName);
    const symbol = index.get(master);
    if (symbol !== undefined && hasPage(master, symbol)) {
      return joinUrl(relativeRoot, documentationPath(master));
    }

    const dot = master.lastIndexOf(".");
    if (dot === -1) return undefined;
    const parent = canonicalName(master.slice(0, dot));
    if (!index.has(parent)) return undefined;
    return joinUrl(relativeRoot, documentationPath(parent)) + "#" + master.slice(dot + 1);
  }

  function referenceToUrl(fullName: string, relativeRoot: string): string {
    const url = tryUrl(fullName, relativeRoot);
    if (url === undefined) {
      throw new UnresolvedReferenceError(fullName, "no such symbol, and its parent is not indexed");
    }
    return url;
  }

  function symbolLink(
    linkText: string,
    fullName: string,
    relativeRoot: string,
    codeRef = true
  ): string {
    const url = referenceToUrl(fullName, relativeRoot);
    return codeRef ? `[\`${linkText}\`](${url})` : `[${linkText}](${url})`;
  }

  function docLink(
    ref: string,
    linkText: string | undefined,
    relativeRoot: string
  ): string {
    let name = ref.slice(1);
    let hashTag = "";
    const hash = name.indexOf("#");
    if (hash !== -1) {
      hashTag = name.slice(hash);
      name = name.slice(0, hash);
    }

    const doc = docIndex.get(name);
    if (!doc) {
      throw new UnresolvedReferenceError(ref, `document "${name}" is not in the document index`);
    }
    const url = documentUrl(relativeRoot, doc.url);
    return `[${linkText ?? doc.title}](${url}${hashTag})`;
  }

  function isKnownModule(ref: string): boolean {
    if (moduleNames.length === 0) return true;
    return moduleNames.some((name) => ref === name || ref.startsWith(name + "."));
  }

  function resolveRef(body: string, relativeRoot: string): string {
    let ref = body;
    let linkText: string | undefined;
    // A `$` in first position marks a document reference, not link text.
    const dollar = body.lastIndexOf("$");
    if (dollar > 0) {
      linkText = body.slice(dollar + 1);
      ref = body.slice(0, dollar);
    }

    if (ref.startsWith("$")) {
      return docLink(ref, linkText, relativeRoot);
    }

    if (!isKnownModule(ref)) {
      throw new UnresolvedReferenceError(body, `"${ref}" is outside the documented modules`);
    }
    const url = tryUrl(ref, relativeRoot);
    if (url === undefined) {
      throw new UnresolvedReferenceError(body, `"${ref}" is not in the symbol index`);
    }
    return linkText === undefined ? `[\`${ref}\`](${url})` : `[${linkText}](${url})`;
  }

  function resolveReference(token: string, relativeRoot: string): string {
    const match = TOKEN_RE.exec(token);
    return resolveRef(match ? match[1] : token, relativeRoot);
  }

  function replaceReferences(text: string, relativeRoot: string): string {
    return text.replace(REFERENCE_RE, (_match, body: string) =>
      resolveRef(body, relativeRoot)
    );
  }

  return {
    replaceReferences,
    resolveReference,
    referenceToUrl,
    symbolLink,
    canonicalName,
    hasSymbol,
    lookup,
  };
}
