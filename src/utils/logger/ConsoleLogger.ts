import type { ILogger, LogLevel } from "../../interfaces/utils/ILogger.js";

const LogLevelValues: Record<LogLevel, number> = {
	DEBUG: 0,
	INFO: 1,
	OK: 2,
	WARN: 3,
	ERROR: 4,
	NONE: 5,
};

/**
 * Códigos ANSI para colores en la consola
 */
const Colors = {
	Reset: "\x1b[0m",
	Debug: "\x1b[36m", // Cyan
	Info: "\x1b[34m", // Blue
	Ok: "\x1b[32m", // Green
	Warn: "\x1b[33m", // Yellow
	Error: "\x1b[31m", // Red
	Dim: "\x1b[2m", // Dim
};

/**
 * Estado compartido entre un logger y sus hijos, para que `setLevel` afecte a todos
 */
interface LevelHolder {
	current: LogLevel;
}

/**
 * Implementación de logger en consola con soporte para colores y niveles
 */
export default class ConsoleLogger implements ILogger {
	readonly #level: LevelHolder;
	readonly #title: string | null;

	constructor(initialLevel: LogLevel | LevelHolder = "DEBUG", title: string | null = null) {
		this.#level = typeof initialLevel === "string" ? { current: initialLevel } : initialLevel;
		this.#title = title;
	}

	public setLevel(level: LogLevel): void {
		this.#level.current = level;
	}

	public getLogger(title: string): ILogger {
		return new ConsoleLogger(this.#level, this.#title ? `${this.#title}:${title}` : title);
	}

	#shouldLog(level: LogLevel): boolean {
		return LogLevelValues[level] >= LogLevelValues[this.#level.current];
	}

	#format(level: LogLevel, message: string): string {
		const levelLabel = level.padEnd(5);
		const timestamp = new Date().toLocaleTimeString("es-ES");
		const text = this.#title ? `[${this.#title}] ${message}` : message;

		switch (level) {
			case "DEBUG":
				return `${Colors.Dim}${timestamp}${Colors.Reset} ${Colors.Debug}[${levelLabel}]${Colors.Reset} ${text}`;
			case "INFO":
				return `${timestamp} ${Colors.Info}[${levelLabel}]${Colors.Reset} ${text}`;
			case "OK":
				return `${timestamp} ${Colors.Ok}[${levelLabel}]${Colors.Reset} ${text}`;
			case "WARN":
				return `${timestamp} ${Colors.Warn}[${levelLabel}]${Colors.Reset} ${text}`;
			case "ERROR":
				return `${timestamp} ${Colors.Error}[${levelLabel}]${Colors.Reset} ${text}`;
			default:
				return text;
		}
	}

	public logDebug(message: string, ...args: unknown[]): void {
		if (this.#shouldLog("DEBUG")) {
			console.log(this.#format("DEBUG", message), ...args);
		}
	}

	public logInfo(message: string, ...args: unknown[]): void {
		if (this.#shouldLog("INFO")) {
			console.log(this.#format("INFO", message), ...args);
		}
	}

	public logOk(message: string, ...args: unknown[]): void {
		if (this.#shouldLog("OK")) {
			console.log(this.#format("OK", message), ...args);
		}
	}

	public logWarn(message: string, ...args: unknown[]): void {
		if (this.#shouldLog("WARN")) {
			console.warn(this.#format("WARN", message), ...args);
		}
	}

	public logError(message: string, ...args: unknown[]): void {
		if (this.#shouldLog("ERROR")) {
			console.error(this.#format("ERROR", message), ...args);
		}
	}
}
