import { OverBoundArgSpecError } from "./errors.js";

export interface ArgSpec {
  names: string[];
  varargsName?: string;
  varkwName?: string;
  /** Source text of each default, aligned to the tail of `names`. */
  defaults: string[];
}

export type PartialBinding =
  | { kind: "positional"; values: readonly unknown[] }
  | { kind: "keyword"; values: Readonly<Record<string, unknown>> };

export interface SignatureOptions {
  /** Leading parameter names treated as the receiver and left out. Default: ["self"] */
  receiverNames?: readonly string[];
}

/**
 * Computes the signature a caller sees after the callable has been wrapped by
 * zero or more partial bindings. Positional records are applied first, then
 * keyword records, each group in the order given.
 */
export function resolveArgSpec(
  declared: ArgSpec,
  bindings: readonly PartialBinding[] = []
): ArgSpec {
  const names = [...declared.names];
  const defaults = [...declared.defaults];
  // Index of the first parameter carrying a default
  let firstDefault = names.length - defaults.length;

  for (const binding of bindings) {
    if (binding.kind !== "positional") continue;
    const count = binding.values.length;
    if (count > names.length) {
      throw new OverBoundArgSpecError(names.length, count);
    }
    names.splice(0, count);
    if (count > firstDefault) {
      defaults.splice(0, count - firstDefault);
    }
    firstDefault = Math.max(0, firstDefault - count);
  }

  for (const binding of bindings) {
    if (binding.kind !== "keyword") continue;
    for (const keyword of Object.keys(binding.values)) {
      const i = names.indexOf(keyword);
      if (i === -1) continue;
      names.splice(i, 1);
      if (i >= firstDefault) {
        defaults.splice(i - firstDefault, 1);
      } else {
        firstDefault -= 1;
      }
    }
  }

  const result: ArgSpec = { names, defaults };
  if (declared.varargsName !== undefined) result.varargsName = declared.varargsName;
  if (declared.varkwName !== undefined) result.varkwName = declared.varkwName;
  return result;
}

export function formatSignature(
  argSpec: ArgSpec,
  options: SignatureOptions = {}
): string {
  const receiverNames = options.receiverNames ?? ["self"];
  const firstDefault = argSpec.names.length - argSpec.defaults.length;
  const firstArg =
    argSpec.names.length > 0 && receiverNames.includes(argSpec.names[0]) ? 1 : 0;

  const parts: string[] = [];
  for (let i = firstArg; i < argSpec.names.length; i++) {
    if (i < firstDefault) {
      parts.push(argSpec.names[i]);
    } else {
      parts.push(`${argSpec.names[i]}=${argSpec.defaults[i - firstDefault]}`);
    }
  }

  if (argSpec.varargsName) parts.push("*" + argSpec.varargsName);
  if (argSpec.varkwName) parts.push("**" + argSpec.varkwName);

  return `(${parts.join(", ")})`;
}
