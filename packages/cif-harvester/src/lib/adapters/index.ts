export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { createProcessSignalHandler, INTERRUPTED_EXIT_CODE } from "./process-signals.js";
export { createNodeFetchResourceFetcher } from "./node-fetch-resource.js";
