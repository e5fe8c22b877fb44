export { App, defaultAppConfig } from "./app";
export { compose, composeTransport } from "./compose";
export { Context, ResponseWriter, type BindResult, type Validator } from "./context";
export { BindError, ContextKeyError, DefaultErrorHandler, HttpError, describeError } from "./errors";
export { createEndpoint, Group, type GroupHost } from "./group";
export { ConsoleTransport, createLogger, Levels, WebLogger, type CreateLoggerOptions } from "./logger";
export { shutdown, toWebRequest, waitForSignal, writeWebResponse, type Closable } from "./node";
export { envelopeResponse, failure, ok, type ResponseBody } from "./response";
export { joinPaths, METHODS, pathnameOf, RouteTable, splitPath, type Lookup, type RouteInfo } from "./router";
export { mimeType, readStaticFile, serveStatic, type StaticFile } from "./static";
export type * from "./types";
