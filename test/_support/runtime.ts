export type TextsliceModule = typeof import("../../src/all/mod.ts");

export async function importTextslice(): Promise<TextsliceModule> {
  return await import("../../src/all/mod.ts");
}
