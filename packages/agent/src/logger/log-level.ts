export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Parse a level name, falling back when it is missing or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	const normalized = value?.trim().toLowerCase();
	return normalized !== undefined && isLogLevel(normalized) ? normalized : fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getCurrentLevel(): LogLevel {
	return currentLevel;
}
