import { TextsliceError } from "../core/error.ts";

/**
 * One piece of a parsed substitution template.
 */
export type SubstitutionPart =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "group"; readonly group: number }
  | { readonly kind: "named"; readonly name: string };

/**
 * Replacement template for regex patterns. `\0` is the whole match, `\1`..`\99` and
 * `\g<n>` numbered groups, `\g<name>` named groups and `\\` a literal backslash.
 */
export interface Substitution {
  readonly kind: "substitution";
  readonly template: string;
  readonly parts: readonly SubstitutionPart[];
}

const TOKEN = /\\(?:(\\)|(\d{1,2})|g<(\d+)>|g<([A-Za-z_$][\w$]*)>)/y;

function invalid(template: string, indexCU: number, reason: string): TextsliceError {
  return new TextsliceError("SUBSTITUTION_INVALID", reason, { template, indexCU });
}

/**
 * Parse a substitution template.
 *
 * @example
 * replace("first second", [[/(\w+) (\w+)/, substitution("\\2 \\1")]]); // "second first"
 */
export function substitution(template: string): Substitution {
  const parts: SubstitutionPart[] = [];
  let text = "";
  let position = 0;
  while (position < template.length) {
    const backslash = template.indexOf("\\", position);
    if (backslash === -1) {
      text += template.slice(position);
      break;
    }
    text += template.slice(position, backslash);
    TOKEN.lastIndex = backslash;
    const token = TOKEN.exec(template);
    if (!token) throw invalid(template, backslash, "Unknown escape in substitution template");
    position = TOKEN.lastIndex;
    const [, escaped, digits, number, name] = token;
    if (escaped !== undefined) {
      text += escaped;
      continue;
    }
    if (text.length > 0) parts.push({ kind: "text", text });
    text = "";
    const group = digits ?? number;
    if (group !== undefined) {
      parts.push({ kind: "group", group: Number(group) });
    } else if (name !== undefined) {
      parts.push({ kind: "named", name });
    }
  }
  if (text.length > 0) parts.push({ kind: "text", text });
  return { kind: "substitution", template, parts };
}

/**
 * Check every group a substitution refers to exists in `regex`.
 */
export function checkSubstitution(value: Substitution, regex: RegExp): void {
  const flags = Array.from(regex.flags)
    .filter((flag) => flag !== "g" && flag !== "y")
    .join("");
  // An empty alternative always matches, exposing the group layout.
  const layout = new RegExp(`${regex.source}|`, flags).exec("");
  const groupCount = layout ? layout.length - 1 : 0;
  const names = new Set(Object.keys(layout?.groups ?? {}));
  for (const part of value.parts) {
    if (part.kind === "group" && part.group > groupCount) {
      throw new TextsliceError("SUBSTITUTION_INVALID", "Substitution refers to a missing group", {
        template: value.template,
        group: part.group,
        groupCount,
      });
    }
    if (part.kind === "named" && !names.has(part.name)) {
      throw new TextsliceError("SUBSTITUTION_INVALID", "Substitution refers to a missing group", {
        template: value.template,
        name: part.name,
      });
    }
  }
}

/**
 * Expand a substitution against a regex match. Groups that did not take part expand to "".
 */
export function expandSubstitution(value: Substitution, captures: RegExpExecArray): string {
  let out = "";
  for (const part of value.parts) {
    switch (part.kind) {
      case "text":
        out += part.text;
        break;
      case "group":
        out += captures[part.group] ?? "";
        break;
      case "named":
        out += captures.groups?.[part.name] ?? "";
        break;
    }
  }
  return out;
}
