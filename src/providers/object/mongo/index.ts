import mongoose, { type Connection, type Model, type Schema } from "mongoose";
import { Logger } from "../../../utils/logger/Logger.js";
import type { ILifecycle } from "../../../interfaces/behaviours/ILifecycle.js";

/**
 * Configuración del proveedor de MongoDB
 */
export interface IMongoConfig {
	uri: string;
	maxRetries: number;
	retryDelay: number;
	connectionTimeout: number;
	serverSelectionTimeout: number;
	socketTimeout: number;
	autoReconnect: boolean;
	reconnectInterval: number;
}

/**
 * Interfaz del proveedor de MongoDB
 */
export interface IMongoProvider {
	/**
	 * Obtiene la conexión actual de Mongoose
	 */
	getConnection(): Connection;

	connect(): Promise<void>;

	disconnect(): Promise<void>;

	isConnected(): boolean;

	/**
	 * Registra un esquema y retorna el modelo (reutiliza el existente si ya está registrado)
	 */
	createModel<T>(name: string, schema: Schema<T>): Model<T>;

	/**
	 * Obtiene estadísticas de la conexión
	 */
	getStats(): {
		connected: boolean;
		connectionString: string;
		retries: number;
		lastError?: string;
	};
}

export const DEFAULT_MONGO_URI = "mongodb://localhost:27017/identity";

/**
 * MongoProvider - Proveedor de conexión a MongoDB con tolerancia a fallos
 *
 * Características:
 * - Conexión con reintentos y backoff exponencial
 * - Reconexión automática en caso de desconexión
 * - Estadísticas de conexión
 */
export default class MongoProvider implements IMongoProvider, ILifecycle {
	public readonly name = "mongo-provider";

	private connection: Connection | null = null;
	private readonly config: IMongoConfig;
	private retryCount = 0;
	private lastError: string | undefined;
	private reconnectTimer: NodeJS.Timeout | null = null;
	private isDisconnecting = false;
	private readonly logger = Logger.getLogger("MongoProvider");

	constructor(options: Partial<IMongoConfig> = {}) {
		// Configuración con valores por defecto
		this.config = {
			uri: options.uri || process.env.MONGODB_URI || DEFAULT_MONGO_URI,
			maxRetries: options.maxRetries ?? 5,
			retryDelay: options.retryDelay ?? 5000,
			connectionTimeout: options.connectionTimeout ?? 10000,
			serverSelectionTimeout: options.serverSelectionTimeout ?? 5000,
			socketTimeout: options.socketTimeout ?? 45000,
			autoReconnect: options.autoReconnect ?? true,
			reconnectInterval: options.reconnectInterval ?? 10000,
		};

		mongoose.set("strict", true);
		mongoose.set("strictQuery", false);
	}

	async start(): Promise<void> {
		this.isDisconnecting = false;
		await this.connect();
	}

	/**
	 * Conecta a MongoDB con reintentos automáticos
	 */
	async connect(): Promise<void> {
		if (this.connection?.readyState === 1) {
			this.logger.logInfo(`Ya conectado a ${this.config.uri}`);
			return;
		}

		try {
			this.logger.logInfo(`Conectando a ${this.config.uri}...`);

			await mongoose.connect(this.config.uri, {
				connectTimeoutMS: this.config.connectionTimeout,
				serverSelectionTimeoutMS: this.config.serverSelectionTimeout,
				socketTimeoutMS: this.config.socketTimeout,
				retryWrites: true,
				retryReads: true,
				maxPoolSize: 10,
				minPoolSize: 5,
			});

			this.connection = mongoose.connection;
			this.retryCount = 0;
			this.lastError = undefined;

			this.#setupConnectionListeners(this.connection);

			this.logger.logOk(`Conectado exitosamente a MongoDB`);
		} catch (error) {
			this.lastError = error instanceof Error ? error.message : String(error);
			this.logger.logError(`Error conectando: ${this.lastError}`);
			await this.#handleConnectionError();
		}
	}

	/**
	 * Maneja errores de conexión con reintentos
	 */
	async #handleConnectionError(): Promise<void> {
		if (this.retryCount < this.config.maxRetries) {
			this.retryCount++;
			const delay = this.config.retryDelay * Math.pow(2, this.retryCount - 1); // Backoff exponencial
			this.logger.logWarn(`Reintentando conexión (${this.retryCount}/${this.config.maxRetries}) en ${delay}ms...`);

			await new Promise((resolve) => setTimeout(resolve, delay));
			await this.connect();
		} else {
			this.logger.logError(`Se alcanzó el máximo de reintentos (${this.config.maxRetries}). No se pudo conectar a MongoDB.`);
			throw new Error(`No se pudo conectar a MongoDB después de ${this.config.maxRetries} intentos`);
		}
	}

	#setupConnectionListeners(connection: Connection): void {
		connection.on("connected", () => {
			this.logger.logOk(`Conexión establecida`);
			this.retryCount = 0;
		});

		connection.on("disconnected", () => {
			this.logger.logWarn(`Desconectado de MongoDB`);

			if (this.config.autoReconnect && !this.isDisconnecting) {
				this.#scheduleReconnect();
			}
		});

		connection.on("error", (error: Error) => {
			this.lastError = error.message;
			this.logger.logError(`Error de conexión: ${error.message}`);
		});

		connection.on("reconnected", () => {
			this.logger.logOk(`Reconectado a MongoDB`);
			this.retryCount = 0;
		});
	}

	#scheduleReconnect(): void {
		if (this.reconnectTimer) return;

		this.logger.logInfo(`Programando reconexión en ${this.config.reconnectInterval}ms...`);
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.connect().catch((err: unknown) => {
				this.logger.logError(`Error en reconexión: ${err}`);
			});
		}, this.config.reconnectInterval);
	}

	getConnection(): Connection {
		if (!this.connection) {
			throw new Error("MongoDB no está conectado");
		}
		return this.connection;
	}

	isConnected(): boolean {
		return this.connection?.readyState === 1;
	}

	createModel<T>(name: string, schema: Schema<T>): Model<T> {
		const connection = this.getConnection();
		// Evitar crear modelos duplicados
		if (connection.modelNames().includes(name)) {
			return connection.model<T>(name);
		}
		return connection.model<T>(name, schema);
	}

	getStats() {
		return {
			connected: this.isConnected(),
			connectionString: this.config.uri,
			retries: this.retryCount,
			lastError: this.lastError,
		};
	}

	/**
	 * Desconecta de MongoDB
	 */
	async disconnect(): Promise<void> {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}

		if (this.connection) {
			this.isDisconnecting = true;
			await mongoose.disconnect();
			this.connection = null;
			this.logger.logOk(`Desconectado de MongoDB`);
		}
	}

	async stop(): Promise<void> {
		this.isDisconnecting = true;
		await this.disconnect();
	}
}
