import { format } from "node:util";
import { ConsoleTransport, Levels, Logger as LogWriter } from "@rabbit-company/logger";
import type { Logger } from "./types";

type WriterConfig = NonNullable<ConstructorParameters<typeof LogWriter>[0]>;

/**
 * Options for {@link createLogger}.
 */
export interface CreateLoggerOptions {
	/**
	 * Most verbose level written.
	 * Default: Levels.DEBUG
	 */
	level?: number;

	/**
	 * Transports to write to.
	 * Default: a single ConsoleTransport
	 */
	transports?: WriterConfig["transports"];

	/**
	 * Existing writer to reuse. Overrides `level` and `transports`.
	 */
	writer?: LogWriter;
}

/**
 * Application logger backed by @rabbit-company/logger.
 * Messages are printf-style (`%s`, `%d`, `%j`) and formatted before they reach the writer.
 */
export class WebLogger implements Logger {
	constructor(private readonly writer: LogWriter) {}

	info(message: string, ...args: unknown[]): void {
		this.writer.log(Levels.INFO, format(message, ...args));
	}

	error(message: string, ...args: unknown[]): void {
		this.writer.log(Levels.ERROR, format(message, ...args));
	}

	debug(message: string, ...args: unknown[]): void {
		this.writer.log(Levels.DEBUG, format(message, ...args));
	}
}

/**
 * Creates the default application logger.
 *
 * @example
 * ```typescript
 * const app = new App({ logger: createLogger({ level: Levels.INFO }) });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const { level = Levels.DEBUG, transports = [new ConsoleTransport()], writer } = options;
	return new WebLogger(writer ?? new LogWriter({ level, transports }));
}

export { Levels, ConsoleTransport };
