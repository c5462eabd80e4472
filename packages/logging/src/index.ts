/**
 * @speech-relay/logging: structured JSON logging with secret masking.
 */

export {
  Logger,
  rootLogger,
  maskSecrets,
  parseLogLevel,
  type LogLevel,
} from "./logger.js";
