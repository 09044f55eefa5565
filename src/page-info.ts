import type { DocstringSections } from "./docstring.js";
import type { SourceLocation, SymbolKind } from "./schema.js";

export interface MemberInfo<S> {
  shortName: string;
  fullName: string;
  /** Undefined for members that are not linked. */
  url?: string;
  /** Borrowed from the symbol index. */
  symbol: S;
  kind: SymbolKind;
  doc: DocstringSections;
  signature?: string;
  isLinkable: boolean;
}

export interface PageInfoBase {
  fullName: string;
  /** Other names of the symbol, never including `fullName`. */
  aliases: string[];
  definedIn?: SourceLocation;
  /** Rendered guide links, or the empty string. */
  guides: string;
  doc: DocstringSections;
}

export interface FunctionPageInfo extends PageInfoBase {
  kind: "function";
  signature: string;
}

export interface ClassPageInfo<S> extends PageInfoBase {
  kind: "class";
  methods: MemberInfo<S>[];
  properties: MemberInfo<S>[];
  classes: MemberInfo<S>[];
  otherMembers: MemberInfo<S>[];
}

export interface ModulePageInfo<S> extends PageInfoBase {
  kind: "module";
  /** In tree order. */
  members: MemberInfo<S>[];
}

export type PageInfo<S> = FunctionPageInfo | ClassPageInfo<S> | ModulePageInfo<S>;
