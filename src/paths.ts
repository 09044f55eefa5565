import path from "node:path";

/** Page path for a dotted name: `a.b.C` → `a/b/C.md`. */
export function documentationPath(fullName: string): string {
  return fullName.replaceAll(".", "/") + ".md";
}

/** Relative path from the page of `fullName` back to the documentation root. */
export function relativePathToRoot(fullName: string): string {
  const depth = fullName.split(".").length - 1;
  if (depth === 0) return ".";
  return Array.from({ length: depth }, () => "..").join("/");
}

export function joinUrl(root: string, target: string): string {
  if (root === "") return target;
  return root.endsWith("/") ? root + target : `${root}/${target}`;
}

// Guides and other documents sit two directories above the API pages.
const DOC_ROOT_FROM_API_ROOT = "../..";

/** Link from an API page to a document addressed relative to the document root. */
export function documentUrl(relativeRoot: string, url: string): string {
  return path.posix.normalize(joinUrl(joinUrl(relativeRoot, DOC_ROOT_FROM_API_ROOT), url));
}
