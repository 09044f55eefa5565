export interface FunctionDetail {
  /** Section keyword without the colon, e.g. "Args" */
  keyword: string;
  /** Free text between the keyword line and the first item. */
  headerText: string;
  /** Indentation that introduces an item line; empty when the section has no items. */
  indent: string;
  items: Array<[name: string, description: string]>;
}

export interface DocstringSections {
  brief: string;
  remainderText: string;
  details: FunctionDetail[];
  compatibility: Record<string, string>;
}

export interface StructureOptions {
  /**
   * Restricts which keywords open a detail section. When omitted any
   * capitalized word on a line of its own followed by a colon is a header.
   */
  detailKeywords?: readonly string[];
}

type State =
  | "InBrief"
  | "InBody"
  | "InCompatibilityBlock"
  | "InDetailHeader"
  | "InDetailItem";

const HEADER_RE = /^([A-Z]\w*):\n$/;
const COMPAT_OPEN_RE = /^[ \t]*@compatibility\((\w+)\)[ \t]*\n?$/;
const COMPAT_CLOSE_RE = /^\s*@end_compatibility/;
const INDENT_RE = /^[ \t]*/;

export function serializeDetail(detail: FunctionDetail): string {
  const parts = [detail.keyword + ":\n", detail.headerText];
  for (const [name, description] of detail.items) {
    parts.push(detail.indent + name + ":" + description);
  }
  return parts.join("");
}

/** Splits text into lines, each keeping its trailing newline. */
function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < text.length) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      lines.push(text.slice(start));
      break;
    }
    lines.push(text.slice(start, end + 1));
    start = end + 1;
  }
  return lines;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function findCompatibilityEnd(lines: string[], from: number): number {
  for (let i = from; i < lines.length; i++) {
    if (COMPAT_CLOSE_RE.test(lines[i])) return i;
  }
  return -1;
}

/**
 * Partitions a docstring into its brief, the remaining body text,
 * keyword-headed detail sections and compatibility notes.
 *
 * Without compatibility blocks the split is lossless:
 * `remainderText + details.map(serializeDetail).join("")` is the input.
 * A compatibility block is replaced by one empty line wherever it occurs.
 */
export function structureDocstring(
  raw: string,
  options: StructureOptions = {}
): DocstringSections {
  const keywords = options.detailKeywords ? new Set(options.detailKeywords) : undefined;
  const lines = splitLines(raw);

  let remainder = "";
  const details: FunctionDetail[] = [];
  const compatibility: Record<string, string> = {};

  let state: State = "InBrief";
  let resumeState: State = "InBody";
  let compatTarget = "";
  let compatContent = "";
  let compatEnd = -1;
  let itemRe: RegExp | undefined;

  const current = (): FunctionDetail => details[details.length - 1];

  // Routes text to whichever part of the output the machine is filling.
  function emit(text: string, target: State): void {
    if (target === "InBrief" || target === "InBody") {
      remainder += text;
    } else if (target === "InDetailHeader") {
      current().headerText += text;
    } else {
      const items = current().items;
      items[items.length - 1][1] += text;
    }
  }

  function headerKeyword(line: string): string | undefined {
    const match = HEADER_RE.exec(line);
    if (!match) return undefined;
    if (keywords && !keywords.has(match[1])) return undefined;
    return match[1];
  }

  function openDetail(keyword: string, index: number): void {
    details.push({ keyword, headerText: "", indent: "", items: [] });
    itemRe = undefined;
    let indent = "";
    for (let j = index + 1; j < lines.length; j++) {
      if (headerKeyword(lines[j]) !== undefined) break;
      if (!isBlank(lines[j])) {
        indent = INDENT_RE.exec(lines[j])?.[0] ?? "";
        break;
      }
    }
    if (indent) {
      current().indent = indent;
      // Variadic parameters are documented as `*args:` and `**kwargs:`.
      itemRe = new RegExp(`^${indent}(\\*{0,2}\\w+):([\\s\\S]*)$`);
    }
  }

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (state === "InCompatibilityBlock") {
      if (i === compatEnd) {
        compatibility[compatTarget] = compatContent;
        emit(line.replace(COMPAT_CLOSE_RE, ""), resumeState);
        state = resumeState;
      } else if (compatContent !== "" || !isBlank(line)) {
        compatContent += line;
      }
      continue;
    }

    if (state === "InBrief") {
      remainder += line;
      state = "InBody";
      continue;
    }

    const open = COMPAT_OPEN_RE.exec(line);
    if (open) {
      const end = findCompatibilityEnd(lines, i + 1);
      if (end !== -1) {
        resumeState = state;
        compatTarget = open[1];
        compatContent = "";
        compatEnd = end;
        state = "InCompatibilityBlock";
        continue;
      }
    }

    const keyword = headerKeyword(line);
    if (keyword !== undefined) {
      openDetail(keyword, i);
      state = "InDetailHeader";
      continue;
    }

    if (state === "InBody") {
      remainder += line;
      continue;
    }

    const item = itemRe?.exec(line);
    if (item) {
      current().items.push([item[1], item[2]]);
      state = "InDetailItem";
      continue;
    }

    emit(line, state);
  }

  return {
    brief: remainder.split("\n")[0],
    remainderText: remainder,
    details,
    compatibility,
  };
}
