export { runUpdatePass } from "./update";
export { handleFetchFailure, shouldQuarantine } from "./quarantine";
export { createDeadline } from "./deadline";
export {
  formatItemMessage,
  formatRemovalNotice,
  resolveFreshness,
  selectNewItems,
} from "./items";
export type { UpdateDeps, UpdatePassResult, UpdateSettings, PassStatus } from "./update";
export type {
  NoticeSummary,
  QuarantineDeps,
  QuarantineOutcome,
  QuarantineSettings,
} from "./quarantine";
export type { Deadline } from "./deadline";
export type { DatedItem } from "./items";
