import type { FunctionDetail } from "./docstring.js";
import { UnknownPageKindError } from "./errors.js";
import type {
  ClassPageInfo,
  FunctionPageInfo,
  MemberInfo,
  ModulePageInfo,
  PageInfo,
} from "./page-info.js";
import type { SourceLocation } from "./schema.js";

/** Renders a page model as markdown. */
export function renderPage<S>(page: PageInfo<S>): string {
  switch (page.kind) {
    case "function":
      return buildFunctionPage(page);
    case "class":
      return buildClassPage(page);
    case "module":
      return buildModulePage(page);
    default: {
      const unknown: { kind?: unknown } = page;
      throw new UnknownPageKindError(unknown.kind);
    }
  }
}

export function renderDefinedIn(location: SourceLocation): string {
  if (location.url) {
    return `Defined in [\`${location.path}\`](${location.url}).\n\n`;
  }
  return `Defined in \`${location.path}\`.\n\n`;
}

function byShortName<S>(a: MemberInfo<S>, b: MemberInfo<S>): number {
  return a.shortName < b.shortName ? -1 : a.shortName > b.shortName ? 1 : 0;
}

function buildFunctionPage(page: FunctionPageInfo): string {
  const parts = [`# ${page.fullName}${page.signature}\n\n`];

  if (page.aliases.length > 0) {
    parts.push(...page.aliases.map((name) => `### \`${name}${page.signature}\`\n`));
    parts.push("\n");
  }

  if (page.definedIn) {
    parts.push("\n\n");
    parts.push(renderDefinedIn(page.definedIn));
  }

  parts.push(page.guides);
  parts.push(page.doc.remainderText);
  parts.push(buildFunctionDetails(page.doc.details));
  parts.push(buildCompatibility(page.doc.compatibility));

  return parts.join("");
}

function buildClassPage<S>(page: ClassPageInfo<S>): string {
  const parts = [`# ${page.fullName}\n\n`];

  if (page.aliases.length > 0) {
    parts.push(...page.aliases.map((name) => `### \`class ${name}\`\n`));
    parts.push("\n");
  }

  if (page.definedIn) {
    parts.push("\n\n");
    parts.push(renderDefinedIn(page.definedIn));
  }

  parts.push(page.guides);
  parts.push(page.doc.remainderText);
  parts.push(buildFunctionDetails(page.doc.details));
  parts.push(buildCompatibility(page.doc.compatibility));
  parts.push("\n\n");

  if (page.classes.length > 0) {
    parts.push("## Child Classes\n");
    const links = page.classes
      .map((info) => `[\`class ${info.shortName}\`](${info.url ?? ""})\n\n`)
      .sort();
    parts.push(...links);
  }

  if (page.properties.length > 0) {
    parts.push("## Properties\n\n");
    for (const prop of [...page.properties].sort(byShortName)) {
      parts.push(`<h3 id="${prop.shortName}"><code>${prop.shortName}</code></h3>\n\n`);
      parts.push(prop.doc.remainderText);
      parts.push(buildFunctionDetails(prop.doc.details));
      parts.push(buildCompatibility(prop.doc.compatibility));
      parts.push("\n\n");
    }
    parts.push("\n\n");
  }

  if (page.methods.length > 0) {
    parts.push("## Methods\n\n");
    for (const method of [...page.methods].sort(byShortName)) {
      parts.push(
        `<h3 id="${method.shortName}"><code>${method.shortName}${method.signature ?? ""}</code></h3>\n\n`
      );
      parts.push(method.doc.remainderText);
      parts.push(buildFunctionDetails(method.doc.details));
      parts.push(buildCompatibility(method.doc.compatibility));
      parts.push("\n\n");
    }
    parts.push("\n\n");
  }

  if (page.otherMembers.length > 0) {
    parts.push("## Class Members\n\n");
    for (const member of [...page.otherMembers].sort(byShortName)) {
      parts.push(`<h3 id="${member.shortName}"><code>${member.shortName}</code></h3>\n\n`);
    }
  }

  return parts.join("");
}

function moduleMemberLine<S>(member: MemberInfo<S>): string {
  if (!member.isLinkable) {
    return "Constant " + member.shortName;
  }

  let linkText = member.shortName;
  let suffix = "";
  if (member.kind === "class") {
    linkText = "class " + member.shortName;
  } else if (member.kind === "function") {
    linkText = member.shortName + "(...)";
  } else if (member.kind === "module") {
    suffix = " module";
  }

  if (member.doc.brief) {
    suffix = `${suffix}: ${member.doc.brief}`;
  }

  return `[\`${linkText}\`](${member.url ?? ""})${suffix}`;
}

function buildModulePage<S>(page: ModulePageInfo<S>): string {
  const parts = [`# Module: ${page.fullName}\n\n`];

  if (page.aliases.length > 0) {
    parts.push(...page.aliases.map((name) => `### Module \`${name}\`\n`));
    parts.push("\n");
  }

  if (page.definedIn) {
    parts.push("\n\n");
    parts.push(renderDefinedIn(page.definedIn));
  }

  parts.push(page.doc.remainderText);
  parts.push("\n\n");
  parts.push("## Members\n\n");

  // No separator after the last member.
  parts.push(page.members.map(moduleMemberLine).join("\n\n"));

  return parts.join("");
}

export function buildCompatibility(compatibility: Readonly<Record<string, string>>): string {
  return Object.keys(compatibility)
    .sort()
    .map((key) => `\n\n#### ${key} compatibility\n${compatibility[key]}\n`)
    .join("");
}

export function buildFunctionDetails(details: readonly FunctionDetail[]): string {
  return details
    .map((detail) => {
      const parts = [`#### ${detail.keyword}:\n\n`, detail.headerText];
      for (const [name, description] of detail.items) {
        parts.push(`* **${name}**:${description}`);
      }
      return parts.join("");
    })
    .join("\n");
}
