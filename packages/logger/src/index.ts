export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
export {getEnvLogger, getEnvLogLevel, getEnvLogFormat, getEnvTimestampFormat} from "./env.js";
export {WinstonLogger, createWinstonLogger} from "./winston.js";
export {getFormat} from "./utils/format.js";
export {ConsoleTransport} from "./utils/consoleTransport.js";
