export * from "../core/mod.ts";
export * from "../unicode/mod.ts";
export * from "../pattern/mod.ts";
export * from "../stream/mod.ts";
export * from "../affix/mod.ts";
export * from "../trim/mod.ts";
export * from "../split/mod.ts";
export * from "../pad/mod.ts";
export * from "../replace/mod.ts";
export * from "../encoding/mod.ts";
