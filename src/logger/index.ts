export {
  debug,
  info,
  warn,
  error,
  withContext,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
} from "./logger";
