export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

let threshold: LogLevel = 'info'

/**
 * Sets the process-wide log threshold. Called once at startup from the loaded settings.
 */
export function setLogLevel(level: LogLevel): void {
	threshold = level
}

export function getLogLevel(): LogLevel {
	return threshold
}

/**
 * Scoped console logger. Every line is prefixed with "[Scope]".
 */
export class Logger {
	private readonly scope: string

	constructor(scope: string) {
		this.scope = scope
	}

	private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
	}

	private format(message: string): string {
		return `[${this.scope}] ${message}`
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.shouldLog('debug')) {
			console.debug(this.format(message), ...args)
		}
	}

	info(message: string, ...args: unknown[]): void {
		if (this.shouldLog('info')) {
			console.log(this.format(message), ...args)
		}
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.shouldLog('warn')) {
			console.warn(this.format(message), ...args)
		}
	}

	error(message: string, ...args: unknown[]): void {
		if (this.shouldLog('error')) {
			console.error(this.format(message), ...args)
		}
	}
}

export function createLogger(scope: string): Logger {
	return new Logger(scope)
}
