export { RunRecorder, fileTimestamp } from "./run-recorder.js";
export type { RunRecorderOptions } from "./run-recorder.js";
