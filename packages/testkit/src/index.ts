/**
 * Test helpers shared by every TaskBridge package
 */

export { MemoryStore } from "./memory-store.js";
export type { RecordedCall, StoreOperation } from "./memory-store.js";
export {
  FIXED_NOW,
  fixedClock,
  containerDoc,
  categoryDoc,
  workUnitDoc,
  captureLogger,
  sampleDocuments,
  openAdapter,
} from "./fixtures.js";
export type { CapturedLogs } from "./fixtures.js";
