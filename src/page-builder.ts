import { formatSignature, resolveArgSpec } from "./argspec.js";
import type { ParserConfig } from "./config.js";
import { structureDocstring, type DocstringSections } from "./docstring.js";
import { UnsupportedSymbolError } from "./errors.js";
import type {
  ClassPageInfo,
  MemberInfo,
  ModulePageInfo,
  PageInfo,
} from "./page-info.js";
import { documentUrl, relativePathToRoot } from "./paths.js";
import type { GuideRef, SymbolKind } from "./schema.js";

function parseDocstring<S>(
  symbol: S,
  relativeRoot: string,
  config: ParserConfig<S>
): DocstringSections {
  const raw = config.host.rawDocstring(symbol);
  const resolved = config.referenceResolver.replaceReferences(raw, relativeRoot);
  return structureDocstring(resolved, { detailKeywords: config.detailKeywords });
}

function signatureOf<S>(symbol: S, config: ParserConfig<S>): string {
  const declared = config.host.declaredSignature(symbol);
  if (!declared) return "";
  const argSpec = resolveArgSpec(declared.argSpec, declared.bindings);
  return formatSignature(argSpec, { receiverNames: config.receiverNames });
}

function guideLink(ref: GuideRef, relativeRoot: string): string {
  const text = ref.sectionTitle ? `${ref.title} > ${ref.sectionTitle}` : ref.title;
  const anchor = ref.sectionTag ? `#${ref.sectionTag}` : "";
  return `[${text}](${documentUrl(relativeRoot, ref.url)}${anchor})`;
}

export function buildGuidesMarkdown(
  names: readonly string[],
  guideIndex: ReadonlyMap<string, readonly GuideRef[]>,
  relativeRoot: string
): string {
  const links = new Set<string>();
  for (const name of names) {
    for (const ref of guideIndex.get(name) ?? []) {
      links.add(guideLink(ref, relativeRoot));
    }
  }
  if (links.size === 0) return "";

  const sorted = [...links].sort();
  const plural = sorted.length > 1 ? "s" : "";
  return `See the guide${plural}: ${sorted.join(", ")}\n\n`;
}

/** Yields each documented child of `fullName` with its symbol, skipping hidden ones. */
function* children<S>(
  fullName: string,
  config: ParserConfig<S>
): Generator<{ shortName: string; childName: string; child: S; kind: SymbolKind }> {
  for (const shortName of config.tree.get(fullName) ?? []) {
    const childName = fullName ? `${fullName}.${shortName}` : shortName;
    if (config.hiddenMembers.has(shortName)) {
      config.onWarning?.(`Skipping ${childName}: hidden member`);
      continue;
    }
    const child = config.index.get(childName);
    if (child === undefined) {
      config.onWarning?.(`Skipping ${childName}: listed in the tree but not in the symbol index`);
      continue;
    }
    yield { shortName, childName, child, kind: config.host.classify(child) };
  }
}

function collectClassMembers<S>(
  page: ClassPageInfo<S>,
  relativeRoot: string,
  config: ParserConfig<S>
): void {
  const resolver = config.referenceResolver;

  for (const { shortName, childName, child, kind } of children(page.fullName, config)) {
    const member: MemberInfo<S> = {
      shortName,
      fullName: childName,
      url: resolver.referenceToUrl(childName, relativeRoot),
      symbol: child,
      kind,
      doc: parseDocstring(child, relativeRoot, config),
      isLinkable: false,
    };

    switch (kind) {
      case "property":
        page.properties.push(member);
        break;
      case "class":
        member.isLinkable = true;
        page.classes.push(member);
        break;
      case "function":
        member.signature = signatureOf(child, config);
        page.methods.push(member);
        break;
      default:
        page.otherMembers.push(member);
    }
  }
}

function collectModuleMembers<S>(
  page: ModulePageInfo<S>,
  relativeRoot: string,
  config: ParserConfig<S>
): void {
  for (const { shortName, childName, child, kind } of children(page.fullName, config)) {
    const isLinkable = kind === "module" || kind === "class" || kind === "function";
    const member: MemberInfo<S> = {
      shortName,
      fullName: childName,
      symbol: child,
      kind,
      doc: parseDocstring(child, relativeRoot, config),
      isLinkable,
    };
    if (isLinkable) {
      member.url = config.referenceResolver.referenceToUrl(childName, relativeRoot);
    }
    if (kind === "function") {
      member.signature = signatureOf(child, config);
    }
    page.members.push(member);
  }
}

/**
 * Builds the page model for one symbol. The page is titled with the
 * canonical name; references in every docstring on the page are resolved
 * relative to the page's location.
 */
export function buildPage<S>(
  fullName: string,
  symbol: S,
  config: ParserConfig<S>
): PageInfo<S> {
  const master = config.referenceResolver.canonicalName(fullName);
  const relativeRoot = relativePathToRoot(master);
  const aliases = (config.duplicates.get(master) ?? []).filter((name) => name !== master);

  const base = {
    fullName: master,
    aliases,
    definedIn: config.host.definedInLocation(symbol),
    guides: buildGuidesMarkdown([master, ...aliases], config.guideIndex, relativeRoot),
    doc: parseDocstring(symbol, relativeRoot, config),
  };

  const kind = config.host.classify(symbol);
  switch (kind) {
    case "function":
    case "property":
      return { ...base, kind: "function", signature: signatureOf(symbol, config) };
    case "class": {
      const page: ClassPageInfo<S> = {
        ...base,
        kind: "class",
        methods: [],
        properties: [],
        classes: [],
        otherMembers: [],
      };
      collectClassMembers(page, relativeRoot, config);
      return page;
    }
    case "module": {
      const page: ModulePageInfo<S> = { ...base, kind: "module", members: [] };
      collectModuleMembers(page, relativeRoot, config);
      return page;
    }
    default:
      throw new UnsupportedSymbolError(fullName, kind);
  }
}
