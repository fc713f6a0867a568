export {
  compareKeys,
  compareNaturally,
  extractKey,
  naturalComparator,
  sortNaturally,
} from "./natural-sort/core";
export type {
  CompareOptions,
  Key,
  NumberToken,
  Ordering,
  SortOptions,
  TextToken,
  Token,
} from "./natural-sort/types";
export {
  buildConcatList,
  createVideoFromFrames,
  listFrames,
  processDirectory,
  resolveOutputName,
} from "./frames-to-video/core";
export type { VideoOptionsInput, VideoResult } from "./frames-to-video/types";
