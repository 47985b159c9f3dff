import type { ILogger, LogLevel } from "../../interfaces/utils/ILogger.js";
import ConsoleLogger from "./ConsoleLogger.js";

const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "OK", "WARN", "ERROR", "NONE"];

/**
 * Nivel de log a partir de texto libre (p.ej. `LOG_LEVEL`). Sin coincidencia: DEBUG
 */
export function parseLogLevel(value: string | undefined): LogLevel {
	const upper = value?.trim().toUpperCase();
	return LOG_LEVELS.find((level) => level === upper) ?? "DEBUG";
}

const rootLogger = new ConsoleLogger(parseLogLevel(process.env.LOG_LEVEL));

/**
 * Punto de acceso al logger raíz del proceso. Los managers y stores reciben
 * un hijo por constructor; solo servicios y proveedores lo piden aquí.
 */
export const Logger = {
	getLogger(title: string): ILogger {
		return rootLogger.getLogger(title);
	},

	/** Afecta también a los loggers hijos ya creados */
	setLevel(level: LogLevel): void {
		rootLogger.setLevel(level);
	},
};
