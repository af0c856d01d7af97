/**
 * Structured logger for @kgvec/engine
 *
 * Every component receives a Logger by injection; child loggers bind
 * request or component context (mode, documentId, backend).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type Context = Record<string, unknown>;

export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: number;
	context?: Context;
	error?: Error;
}

export interface Logger {
	debug(message: string, context?: Context): void;
	info(message: string, context?: Context): void;
	warn(message: string, context?: Context): void;
	error(message: string, error?: Error, context?: Context): void;

	/** Logger that adds `context` to every entry */
	child(context: Context): Logger;

	setLevel(level: LogLevel): void;

	/** Stored entries, oldest first (only with `storeEntries`) */
	getEntries(): LogEntry[];
	clear(): void;
}

export type LogSink = (level: LogLevel, line: string, error?: Error) => void;

export interface LoggerOptions {
	/** Minimum level; default "info" */
	level?: LogLevel;
	/** Keep entries in memory for getEntries(); default false */
	storeEntries?: boolean;
	/** default 1000 */
	maxEntries?: number;
	/** Write formatted lines to the sink; default true */
	console?: boolean;
	/** Where lines go; the CLI routes these to stderr */
	sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PREFIX = "[kgvec]";

const SECRET_KEY = /password|api_?key|secret|token/i;

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(SEVERITY, value);
}

/** Mask credential-looking keys (Neo4j password, Voyage key) before they reach a sink */
export function redactContext(context: Context): Context {
	return Object.fromEntries(
		Object.entries(context).map(([key, value]) => [
			key,
			value !== undefined && SECRET_KEY.test(key) ? "[redacted]" : value,
		]),
	);
}

const consoleSink: LogSink = (level, line, error) => {
	console[level](line);
	if (level === "error" && error?.stack) console.error(error.stack);
};

function formatLine(entry: LogEntry): string {
	const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
	const time = new Date(entry.timestamp).toISOString();
	return `${time} ${PREFIX} [${entry.level.toUpperCase()}] ${entry.message}${context}`;
}

interface SharedState {
	store: boolean;
	max: number;
	entries: LogEntry[];
	sink?: LogSink;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const shared: SharedState = {
		store: options.storeEntries ?? false,
		max: options.maxEntries ?? 1000,
		entries: [],
		sink: options.console === false ? undefined : (options.sink ?? consoleSink),
	};
	return bind(shared, options.level ?? "info", {});
}

/** Children inherit the level at creation and share the entry buffer */
function bind(shared: SharedState, initialLevel: LogLevel, bound: Context): Logger {
	let minimum = initialLevel;

	const emit = (level: LogLevel, message: string, context?: Context, error?: Error): void => {
		if (SEVERITY[level] < SEVERITY[minimum]) return;

		const merged = redactContext({ ...bound, ...context });
		const entry: LogEntry = {
			level,
			message,
			timestamp: Date.now(),
			context: Object.keys(merged).length > 0 ? merged : undefined,
			error,
		};

		if (shared.store) {
			shared.entries.push(entry);
			if (shared.entries.length > shared.max) shared.entries.shift();
		}
		shared.sink?.(level, formatLine(entry), error);
	};

	return {
		debug: (message, context) => emit("debug", message, context),
		info: (message, context) => emit("info", message, context),
		warn: (message, context) => emit("warn", message, context),
		error: (message, error, context) => emit("error", message, context, error),
		child: (context) => bind(shared, minimum, { ...bound, ...context }),
		setLevel: (level) => {
			minimum = level;
		},
		getEntries: () => shared.entries.slice(),
		clear: () => {
			shared.entries.length = 0;
		},
	};
}

/** Discards everything */
export const nullLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => nullLogger,
	setLevel: () => {},
	getEntries: () => [],
	clear: () => {},
};
