export { Chain } from "./chain.js";
export { Cycle } from "./cycle.js";
export { Enumerate } from "./enumerate.js";
export { Filter } from "./filter.js";
export { FilterMap } from "./filter-map.js";
export { FlatMap, Flatten } from "./flat-map.js";
export { Fuse } from "./fuse.js";
export { Inspect } from "./inspect.js";
export { Map } from "./map.js";
export { Peekable } from "./peekable.js";
export { Rev } from "./rev.js";
export { MapWhile, Scan } from "./scan.js";
export type { State } from "./scan.js";
export { Skip, SkipWhile } from "./skip.js";
export { StepBy } from "./step-by.js";
export { Take, TakeWhile } from "./take.js";
export { Zip } from "./zip.js";
