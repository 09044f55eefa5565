import type { ArgSpec, PartialBinding } from "./argspec.js";
import type { SourceLocation, SymbolKind } from "./schema.js";

export interface DeclaredSignature {
  argSpec: ArgSpec;
  bindings: PartialBinding[];
}

/**
 * Capability queries answered by whatever discovered the symbols. The core
 * never inspects a symbol handle `S` itself; it only branches on these answers.
 */
export interface SymbolHost<S> {
  classify(symbol: S): SymbolKind;
  rawDocstring(symbol: S): string;
  /** Undefined for symbols that are not callable. */
  declaredSignature(symbol: S): DeclaredSignature | undefined;
  definedInLocation(symbol: S): SourceLocation | undefined;
}

/** Kinds that are documented on a page of their own. */
export function isPageKind(kind: SymbolKind): boolean {
  return kind === "module" || kind === "class" || kind === "function";
}
