import fs from "node:fs/promises";
import { createParserConfig, type ParserConfig, type ParserConfigOptions } from "./config.js";
import { ManifestError } from "./errors.js";
import type { SymbolHost } from "./host.js";
import { ManifestSchema, type Manifest, type SymbolRecord } from "./schema.js";

export function parseManifest(value: unknown, manifestPath?: string): Manifest {
  const result = ManifestSchema.safeParse(value);
  if (!result.success) {
    const where = manifestPath ? ` for ${manifestPath}` : "";
    throw new ManifestError(
      `Schema validation failed${where}: ${result.error.message}`,
      manifestPath
    );
  }
  return result.data;
}

export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ManifestError(`Manifest file not found at ${manifestPath}`, manifestPath);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ManifestError(`Invalid JSON in ${manifestPath}`, manifestPath);
  }

  return parseManifest(parsed, manifestPath);
}

/** Answers the capability queries from the records of a manifest. */
export function createManifestHost(): SymbolHost<SymbolRecord> {
  return {
    classify: (record) => record.kind,
    rawDocstring: (record) => record.docstring ?? "",
    declaredSignature(record) {
      const signature = record.signature;
      if (!signature) return undefined;
      const { bindings, ...argSpec } = signature;
      return { argSpec, bindings };
    },
    definedInLocation: (record) => record.definedIn,
  };
}

function toMap<V>(record: Readonly<Record<string, V>>): Map<string, V> {
  return new Map(Object.entries(record));
}

export function createParserConfigFromManifest(
  manifest: Manifest,
  options: Omit<
    ParserConfigOptions<SymbolRecord>,
    "index" | "host" | "duplicateOf" | "tree" | "docIndex" | "guideIndex" | "moduleNames"
  > = {}
): ParserConfig<SymbolRecord> {
  return createParserConfig({
    ...options,
    index: toMap(manifest.symbols),
    host: createManifestHost(),
    duplicateOf: toMap(manifest.duplicateOf),
    tree: toMap(manifest.tree),
    docIndex: toMap(manifest.docIndex),
    guideIndex: toMap(manifest.guideIndex),
    moduleNames: manifest.moduleNames,
  });
}
