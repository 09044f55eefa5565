export class UnresolvedReferenceError extends Error {
  readonly reference: string;

  constructor(reference: string, detail: string) {
    super(`Unresolved reference "@{${reference}}": ${detail}`);
    this.name = "UnresolvedReferenceError";
    this.reference = reference;
  }
}

export class OverBoundArgSpecError extends Error {
  readonly declared: number;
  readonly bound: number;

  constructor(declared: number, bound: number) {
    super(
      `Partial binding supplies ${bound} positional values but only ${declared} named parameters remain`
    );
    this.name = "OverBoundArgSpecError";
    this.declared = declared;
    this.bound = bound;
  }
}

export class UnsupportedSymbolError extends Error {
  readonly fullName: string;

  constructor(fullName: string, kind: string) {
    super(`Cannot build a page for ${fullName}: symbols of kind "${kind}" have no page`);
    this.name = "UnsupportedSymbolError";
    this.fullName = fullName;
  }
}

export class UnknownPageKindError extends Error {
  constructor(kind: unknown) {
    super(`Unknown page info kind: ${String(kind)}`);
    this.name = "UnknownPageKindError";
  }
}

export class ManifestError extends Error {
  readonly manifestPath?: string;

  constructor(message: string, manifestPath?: string) {
    super(message);
    this.name = "ManifestError";
    this.manifestPath = manifestPath;
  }
}
