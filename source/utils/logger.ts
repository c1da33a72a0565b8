import chalk from "chalk";

export type Logger = {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	success(message: string): void;
};

export type LoggerOptions = {
	verbose?: boolean;
	stdout?: NodeJS.WritableStream;
	stderr?: NodeJS.WritableStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const stdout = options.stdout ?? process.stdout;
	const stderr = options.stderr ?? process.stderr;
	const verbose = options.verbose ?? false;

	return {
		debug(message) {
			if (verbose) {
				stderr.write(`${chalk.gray(`debug: ${message}`)}\n`);
			}
		},
		info(message) {
			stdout.write(`${message}\n`);
		},
		warn(message) {
			stderr.write(`${chalk.yellow(`warning: ${message}`)}\n`);
		},
		error(message) {
			stderr.write(`${chalk.red(message)}\n`);
		},
		success(message) {
			stdout.write(`${chalk.green(message)}\n`);
		},
	};
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
	success() {},
};
