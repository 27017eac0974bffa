/**
 * Levelled logger for the paclean CLI.
 * Everything goes to stderr so listed package names on stdout stay pipeable.
 */
import chalk from 'chalk';

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	SILENT = 4,
}

export type LogSink = (line: string) => void;

export class Logger {
	private level: LogLevel;
	private readonly sink: LogSink;

	constructor(level: LogLevel = LogLevel.INFO, sink: LogSink = (line) => process.stderr.write(line + '\n')) {
		this.level = level;
		this.sink = sink;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	debug(message: string): void {
		if (this.level <= LogLevel.DEBUG) this.sink(chalk.gray(`debug ${message}`));
	}

	info(message: string): void {
		if (this.level <= LogLevel.INFO) this.sink(message);
	}

	success(message: string): void {
		if (this.level <= LogLevel.INFO) this.sink(`${chalk.green('✓')} ${message}`);
	}

	warn(message: string): void {
		if (this.level <= LogLevel.WARN) this.sink(chalk.yellow(`⚠ ${message}`));
	}

	error(message: string): void {
		if (this.level <= LogLevel.ERROR) this.sink(chalk.red(`✗ ${message}`));
	}
}

export const logger = new Logger();
