export type { ReplaceFn, ReplaceOptions, ReplacePair, Replacement } from "./replace.ts";
export { replace, replaceInto } from "./replace.ts";
export type { Substitution, SubstitutionPart } from "./substitution.ts";
export { substitution } from "./substitution.ts";
