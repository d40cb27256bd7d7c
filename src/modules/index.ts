/**
 * Pipeline modules export
 */

export { run } from "./orchestrator";
export { pageWorker } from "./page-worker";
export { downloadWorker } from "./download-worker";
export { stats } from "./stats";
