import { z } from "zod";

export const SYMBOL_KINDS = ["module", "class", "function", "property", "other"] as const;

export const SourceLocationSchema = z.object({
  path: z.string(),
  url: z.string().optional(),
});

export const PartialBindingSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("positional"), values: z.array(z.unknown()) }),
  z.object({ kind: z.literal("keyword"), values: z.record(z.string(), z.unknown()) }),
]);

export const SignatureSchema = z.object({
  names: z.array(z.string()),
  varargsName: z.string().optional(),
  varkwName: z.string().optional(),
  defaults: z.array(z.string()).default([]),   // source text, aligned to the tail of names
  bindings: z.array(PartialBindingSchema).default([]),
});

export const SymbolRecordSchema = z.object({
  kind: z.enum(SYMBOL_KINDS),
  docstring: z.string().optional(),
  signature: SignatureSchema.optional(),
  definedIn: SourceLocationSchema.optional(),
});

export const DocInfoSchema = z.object({
  title: z.string(),
  url: z.string(),
});

export const GuideRefSchema = z.object({
  title: z.string(),
  url: z.string(),
  sectionTitle: z.string().optional(),
  sectionTag: z.string().optional(),
});

export const ManifestSchema = z.object({
  version: z.string(),
  libraryName: z.string(),
  moduleNames: z.array(z.string()).default([]),
  symbols: z.record(z.string(), SymbolRecordSchema),   // keyed by full dotted name
  duplicateOf: z.record(z.string(), z.string()).default({}),
  tree: z.record(z.string(), z.array(z.string())).default({}),
  docIndex: z.record(z.string(), DocInfoSchema).default({}),
  guideIndex: z.record(z.string(), z.array(GuideRefSchema)).default({}),
});

export type SymbolKind = (typeof SYMBOL_KINDS)[number];
export type SourceLocation = z.infer<typeof SourceLocationSchema>;
export type SymbolRecord = z.infer<typeof SymbolRecordSchema>;
export type GuideRef = z.infer<typeof GuideRefSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
