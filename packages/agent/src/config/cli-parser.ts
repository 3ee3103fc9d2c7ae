/**
 * CLI argument parsing for agent configuration.
 * Flags take the form `--name=value`; booleans are bare `--name`.
 */

export interface ParsedArgs {
	agentName?: string;
	serverUrl?: string;
	updatesEnabled?: boolean;
	updatesUrl?: string;
	updatesCycleSleepMs?: number;
	resultsEnabled?: boolean;
	resultsUrl?: string;
	resultsCycleSleepMs?: number;
	resultsSecure?: boolean;
	surveyUrl?: string;
	surveySecure?: boolean;
	timelineUrl?: string;
	trustAllCertificates?: boolean;
	requestTimeoutMs?: number;
	jitterMs?: number;
	instanceDir?: string;
	logDir?: string;
	timelinesDir?: string;
	killAfterSeconds?: number;
	logLevel?: string;
}

type StringKey = {
	[K in keyof ParsedArgs]-?: NonNullable<ParsedArgs[K]> extends string ? K : never;
}[keyof ParsedArgs];

type NumberKey = {
	[K in keyof ParsedArgs]-?: NonNullable<ParsedArgs[K]> extends number ? K : never;
}[keyof ParsedArgs];

const STRING_FLAGS: Record<string, StringKey> = {
	"--agent-name=": "agentName",
	"--server-url=": "serverUrl",
	"--updates-url=": "updatesUrl",
	"--results-url=": "resultsUrl",
	"--survey-url=": "surveyUrl",
	"--timeline-url=": "timelineUrl",
	"--instance-dir=": "instanceDir",
	"--log-dir=": "logDir",
	"--timelines-dir=": "timelinesDir",
	"--log-level=": "logLevel",
};

const NUMBER_FLAGS: Record<string, NumberKey> = {
	"--updates-cycle-sleep-ms=": "updatesCycleSleepMs",
	"--results-cycle-sleep-ms=": "resultsCycleSleepMs",
	"--request-timeout-ms=": "requestTimeoutMs",
	"--jitter-ms=": "jitterMs",
	"--kill-after=": "killAfterSeconds",
};

function applyFlag(parsed: ParsedArgs, arg: string): boolean {
	for (const [prefix, key] of Object.entries(STRING_FLAGS)) {
		if (arg.startsWith(prefix)) {
			parsed[key] = arg.slice(prefix.length);
			return true;
		}
	}
	for (const [prefix, key] of Object.entries(NUMBER_FLAGS)) {
		if (arg.startsWith(prefix)) {
			const value = parseInt(arg.slice(prefix.length), 10);
			if (!isNaN(value)) {
				parsed[key] = value;
			}
			return true;
		}
	}
	return false;
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (const arg of args) {
		if (arg === "--no-updates") {
			parsed.updatesEnabled = false;
		} else if (arg === "--no-results") {
			parsed.resultsEnabled = false;
		} else if (arg === "--results-secure") {
			parsed.resultsSecure = true;
		} else if (arg === "--survey-secure") {
			parsed.surveySecure = true;
		} else if (arg === "--trust-all-certificates") {
			parsed.trustAllCertificates = true;
		} else {
			applyFlag(parsed, arg);
		}
	}

	return parsed;
}
