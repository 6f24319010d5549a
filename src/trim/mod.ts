export type { ChopOptions, TrimInput } from "./trim.ts";
export { chomp, chop, chopPrefix, chopSuffix, lstrip, rstrip, strip } from "./trim.ts";
