export * from "./types.js";
export { TrackedWorld } from "./tracked.js";
export { createMemoryWorld, type CalendarDate, type MemoryWorld, type MemoryWorldOptions } from "./memory.js";
export { createFileSystemWorld, type FileSystemWorld, type FileSystemWorldOptions } from "./fs.js";
