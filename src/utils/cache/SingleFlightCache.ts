export interface SingleFlightCacheOptions {
	/** Máximo de entradas (LRU). Por defecto 1000 */
	maxSize?: number;
	/** Vida de una entrada resuelta en ms. Por defecto 60000 */
	ttlMs?: number;
}

interface CacheEntry<V> {
	promise: Promise<V>;
	settled: boolean;
	expiresAt: number;
}

/**
 * Cache asíncrona por clave con semántica single-flight.
 *
 * - Una sola población por clave: las llamadas concurrentes esperan la misma promesa.
 * - `invalidate` durante una población en curso descarta su resultado.
 * - Las poblaciones fallidas no se guardan.
 * - LRU por tamaño y expiración por TTL, como el cache de permisos resueltos.
 */
export class SingleFlightCache<V> {
	#entries = new Map<string, CacheEntry<V>>();
	#maxSize: number;
	#ttlMs: number;

	constructor(options: SingleFlightCacheOptions = {}) {
		this.#maxSize = options.maxSize ?? 1000;
		this.#ttlMs = options.ttlMs ?? 60000;
	}

	get size(): number {
		return this.#entries.size;
	}

	has(key: string): boolean {
		const entry = this.#entries.get(key);
		return entry !== undefined && !this.#isExpired(entry);
	}

	/**
	 * Devuelve el valor cacheado o ejecuta `factory` una única vez para la clave
	 */
	getOrPopulate(key: string, factory: () => Promise<V>): Promise<V> {
		const existing = this.#entries.get(key);
		if (existing) {
			if (!this.#isExpired(existing)) {
				// Move to end (most recently used)
				this.#entries.delete(key);
				this.#entries.set(key, existing);
				return existing.promise;
			}
			this.#entries.delete(key);
		}

		// La entrada se registra antes de que arranque factory
		const promise = Promise.resolve().then(factory);
		const entry: CacheEntry<V> = { promise, settled: false, expiresAt: Number.POSITIVE_INFINITY };
		this.#store(key, entry);

		void promise.then(
			() => {
				if (this.#entries.get(key) === entry) {
					entry.settled = true;
					entry.expiresAt = Date.now() + this.#ttlMs;
				}
			},
			() => {
				if (this.#entries.get(key) === entry) {
					this.#entries.delete(key);
				}
			}
		);

		return promise;
	}

	invalidate(key: string): boolean {
		return this.#entries.delete(key);
	}

	/**
	 * Invalida todas las claves que empiezan por `prefix`
	 */
	invalidatePrefix(prefix: string): number {
		let removed = 0;
		for (const key of [...this.#entries.keys()]) {
			if (key.startsWith(prefix)) {
				this.#entries.delete(key);
				removed++;
			}
		}
		return removed;
	}

	clear(): void {
		this.#entries.clear();
	}

	#isExpired(entry: CacheEntry<V>): boolean {
		return entry.settled && Date.now() >= entry.expiresAt;
	}

	#store(key: string, entry: CacheEntry<V>): void {
		if (this.#entries.size >= this.#maxSize) {
			// Remove least recently used (first item)
			const firstKey = this.#entries.keys().next().value;
			if (firstKey !== undefined) {
				this.#entries.delete(firstKey);
			}
		}
		this.#entries.set(key, entry);
	}
}
