export { cors, type CorsOptions } from "./cors";
export { logger, type LoggerOptions } from "./logger";
export { recover, type RecoverOptions } from "./recover";
export { timeout } from "./timeout";
