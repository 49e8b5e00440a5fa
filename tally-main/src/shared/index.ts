export { devLog, devWarn, devError, setDebugLogging } from "./debug-log.js";
