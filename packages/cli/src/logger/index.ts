// pattern: Functional Core

export {
  createLogger,
  createSilentLogger,
  mapLogLevelToPinoLevel,
} from "./config.js";
export {
  CLI_LOGGER,
  getCliLogger,
  initializeLogger,
  setCliLogLevel,
} from "./instance.js";
export {
  isLogFormat,
  isLogLevel,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "./types.js";
