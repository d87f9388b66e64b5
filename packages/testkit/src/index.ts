export { createTempRoot, removeDir, withTempBucket } from "./fs.js";
export { FaultyFileSystem } from "./faults.js";
export type { Fault, FaultOperation } from "./faults.js";
export { clock } from "./timers.js";
