// pattern: Imperative Shell

// Process-wide collaborators shared by every command
export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
