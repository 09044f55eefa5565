import type { ParserConfig } from "./config.js";
import { buildPage } from "./page-builder.js";
import { documentationPath } from "./paths.js";
import { renderPage } from "./pretty-docs.js";

export interface ProgressInfo {
  phase: string;
  current: number;
  total: number;
  name?: string;
}

export interface PageError {
  fullName: string;
  error: unknown;
}

export interface GeneratePagesOptions {
  /** Restrict generation to these names. Default: every symbol with a page. */
  names?: Iterable<string>;
  onProgress?: (info: ProgressInfo) => void;
  onError?: (fullName: string, error: unknown) => void;
}

export interface GeneratedPages {
  /** Documentation path (`a/b/C.md`) → markdown, in name order. */
  pages: Map<string, string>;
  errors: PageError[];
}

/**
 * Builds and renders the page of every canonical symbol that has one. A page
 * that fails is recorded and reported; the remaining pages are still built.
 */
export function generatePages<S>(
  config: ParserConfig<S>,
  options: GeneratePagesOptions = {}
): GeneratedPages {
  const { onProgress, onError } = options;
  const candidates = options.names ? [...options.names] : [...config.index.keys()];

  const names = candidates
    .filter((name) => !config.duplicateOf.has(name) && config.hasPage(name))
    .sort();

  const pages = new Map<string, string>();
  const errors: PageError[] = [];

  for (let i = 0; i < names.length; i++) {
    const fullName = names[i];
    onProgress?.({ phase: "pages", current: i + 1, total: names.length, name: fullName });

    const symbol = config.index.get(fullName);
    if (symbol === undefined) continue;

    try {
      const page = buildPage(fullName, symbol, config);
      pages.set(documentationPath(fullName), renderPage(page));
    } catch (error) {
      errors.push({ fullName, error });
      onError?.(fullName, error);
    }
  }

  return { pages, errors };
}
