export { bytesHash, digest, isHashable, stableHash, stableSerialize, type Hashable } from "./hash.js";
export { memoize, MemoStore, type EffectAnchor, type MemoSpec, type MemoStats, type MemoFunctionStats, type MemoStoreOptions } from "./store.js";
export type { Constraint, EffectLog, TrackedInput } from "./tracked.js";
