export { devLog, devWarn, devError, isDebugEnabled } from "./debug-log.js";
export { readJsonFile, readTextFile } from "./io.js";
