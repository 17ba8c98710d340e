/**
 * Structured Logging Module
 *
 * Provides structured logging for pipeline stages, collaborator failures,
 * skipped units and slow operations using JSON Lines (.jsonl) format.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Collaborator failure log entry (source, embedder, store, search service)
 */
export interface CollaboratorFailureLog extends BaseLogEntry {
	type: 'collaborator_failure';
	level: 'error' | 'fatal';
	stage: string;
	operation: string;
	error_code: string;
	error_message: string;
	stack_trace?: string;
	context?: Record<string, unknown>;
}

/**
 * Slow operation log entry
 */
export interface SlowOperationLog extends BaseLogEntry {
	type: 'slow_operation';
	level: 'warn';
	operation: string;
	duration_ms: number;
	threshold_ms: number;
	item_count?: number;
	context?: Record<string, unknown>;
}

/**
 * A unit (record, line, datapoint) dropped during a batch
 */
export interface SkippedUnitLog extends BaseLogEntry {
	type: 'skipped_unit';
	level: 'debug' | 'info' | 'warn';
	stage: string;
	reason: string;
	location?: string;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Union type for all log entries
 */
export type LogEntry = CollaboratorFailureLog | SlowOperationLog | SkippedUnitLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files (no file output when unset) */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

function isLogLevel(value: string | undefined): value is LogLevel {
	return value !== undefined && (LEVELS as string[]).includes(value);
}

/**
 * Structured logger for pipeline operations
 */
export class Logger {
	private logDir: string | undefined;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		if (this.logDir) {
			this.ensureLogDirectory(this.logDir);
		}
	}

	/**
	 * Apply the given settings, keeping the current ones for anything unset
	 */
	configure(config: LoggerConfig): void {
		if (config.logDir !== undefined) {
			this.logDir = config.logDir;
			this.ensureLogDirectory(config.logDir);
		}
		if (config.console !== undefined) {
			this.consoleEnabled = config.console;
		}
		if (config.consoleLevel !== undefined) {
			this.consoleLevel = config.consoleLevel;
		}
	}

	/**
	 * Change the console threshold (used by --verbose / --quiet)
	 */
	setConsoleLevel(level: LogLevel): void {
		this.consoleLevel = level;
	}

	private ensureLogDirectory(dir: string): void {
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	/**
	 * Output to console if enabled and above threshold
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, JSON.stringify(entry, null, 2));
				break;
			case 'warn':
				console.warn(prefix, JSON.stringify(entry, null, 2));
				break;
			default:
				console.log(prefix, JSON.stringify(entry, null, 2));
		}
	}

	/**
	 * Log a failure raised by an external collaborator
	 */
	logCollaboratorFailure(
		stage: string,
		operation: string,
		error: unknown,
		context?: Record<string, unknown>
	): void {
		const cause = error instanceof Error ? error : undefined;
		const code =
			cause && 'code' in cause && typeof cause.code === 'string' ? cause.code : 'UNKNOWN';

		const entry: CollaboratorFailureLog = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'collaborator_failure',
			stage,
			operation,
			error_code: code,
			error_message: cause ? cause.message : String(error),
			stack_trace: cause?.stack,
			context,
		};

		this.writeLogEntry('collaborator-failures', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log an operation that exceeded its time budget
	 */
	logSlowOperation(
		operation: string,
		durationMs: number,
		thresholdMs: number,
		context?: { itemCount?: number; additionalContext?: Record<string, unknown> }
	): void {
		const entry: SlowOperationLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'slow_operation',
			operation,
			duration_ms: Math.round(durationMs),
			threshold_ms: thresholdMs,
			item_count: context?.itemCount,
			context: context?.additionalContext,
		};

		this.writeLogEntry('slow-operations', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a unit dropped from a batch
	 */
	logSkippedUnit(stage: string, reason: string, location?: string): void {
		const entry: SkippedUnitLog = {
			timestamp: new Date().toISOString(),
			level: 'info',
			type: 'skipped_unit',
			stage,
			reason,
			location,
		};

		this.writeLogEntry('skipped', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}
}

/**
 * Logger settings from `VECTOR_PIPELINE_LOG_DIR` and `LOG_LEVEL`
 */
export function loggerConfigFromEnvironment(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
	const level = env.LOG_LEVEL;
	return {
		logDir: env.VECTOR_PIPELINE_LOG_DIR || undefined,
		consoleLevel: isLogLevel(level) ? level : undefined,
	};
}

/**
 * Default logger instance; reconfigure it once `.env` has been loaded
 */
export const logger = new Logger(loggerConfigFromEnvironment());
