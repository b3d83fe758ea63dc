/**
 * Logger - File-based logging for the library.
 *
 * - createServiceLogger: per-service hourly files (cli, worker)
 * - createNullLogger: no-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogPath,
	getServiceLogsDir,
	type ServiceName,
} from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

function fromWriter(write: (entry: string) => void): Logger {
	return {
		debug(component: string, message: string, data?: object) {
			write(formatEntry('debug', component, message, data));
		},

		info(component: string, message: string, data?: object) {
			write(formatEntry('info', component, message, data));
		},

		warn(component: string, message: string, data?: object) {
			write(formatEntry('warn', component, message, data));
		},

		error(component: string, message: string, error?: Error) {
			write(formatEntry('error', component, message, error));
		},
	};
}

/**
 * Create a service-specific logger with hourly rotation.
 *
 * Logs are written to: `<library>/logs/<service>/YYYY-MM-DD-HH.log`
 *
 * @example
 * const logger = createServiceLogger('/data/library', 'worker');
 * logger.error('IndexingWorker', 'Setup failed', error);
 */
export function createServiceLogger(
	libraryRoot: string,
	service: ServiceName,
): Logger {
	return fromWriter(entry => {
		try {
			// The library directory may be removed while we run (e.g. /reset of a temp store)
			fs.mkdirSync(getServiceLogsDir(libraryRoot, service), {recursive: true});
			fs.appendFileSync(getServiceLogPath(libraryRoot, service), entry + '\n');
		} catch {
			// Dropped: no place left to write it
		}
	});
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
