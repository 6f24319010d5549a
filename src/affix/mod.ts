export type { AffixInput, TextTest } from "./affix.ts";
export { contains, endsWith, startsWith } from "./affix.ts";
export { startsWithStream } from "./stream-probe.ts";
