export type { SplitOptions } from "./split.ts";
export {
  RSplitIterator,
  SplitIterator,
  eachRSplit,
  eachSplit,
  partition,
  rsplit,
  split,
} from "./split.ts";
