import * as path from "node:path";
import * as fs from "node:fs/promises";
import { Logger } from "../utils/logger/Logger.js";
import type { ILogger } from "../interfaces/utils/ILogger.js";
import type { ILifecycle } from "../interfaces/behaviours/ILifecycle.js";

export interface BaseServiceOptions {
	/** Ruta explícita del config.json; por defecto el del directorio del service */
	configPath?: string;
	/** Configuración que prevalece sobre la del fichero */
	config?: unknown;
}

/**
 * Clase base abstracta para todos los Services.
 * Carga el config.json que acompaña al service y lo combina con las opciones.
 */
export abstract class BaseService<TConfig> implements ILifecycle {
	/** Nombre único del service */
	abstract readonly name: string;

	protected readonly logger: ILogger = Logger.getLogger(this.constructor.name);
	protected config: TConfig;

	constructor(
		defaultConfig: TConfig,
		protected readonly options: BaseServiceOptions = {}
	) {
		this.config = defaultConfig;
	}

	/**
	 * Combina `raw` (JSON sin validar) sobre `base`, ignorando valores de tipo incorrecto
	 */
	protected abstract mergeConfig(base: TConfig, raw: unknown): TConfig;

	/**
	 * Directorio del service, donde se busca config.json
	 */
	protected abstract getServiceDir(): string;

	/**
	 * Lógica de inicialización del service
	 */
	public async start(): Promise<void> {
		const configPath = this.options.configPath ?? path.join(this.getServiceDir(), "config.json");

		this.logger.logInfo(`Inicializando ${this.name}...`);

		let fileConfig: unknown = {};
		try {
			const configContent = await fs.readFile(configPath, "utf-8");
			fileConfig = JSON.parse(configContent);
		} catch (e) {
			this.logger.logDebug(`No se pudo leer config.json: ${e instanceof Error ? e.message : e}`);
		}

		// options tiene prioridad
		this.config = this.mergeConfig(this.mergeConfig(this.config, fileConfig), this.options.config ?? {});
	}

	/**
	 * Lógica de cierre del service
	 */
	public async stop(): Promise<void> {
		this.logger.logOk(`Detenido.`);
	}
}
