export interface CustomErrorJSON<T = Record<string, unknown>, M extends string = string> {
	name: string;
	status: number;
	errorKey: M;
	message: string;
	data?: T;
}

/**
 * Base abstract class for every error raised by the identity core.
 * `errorKey` doubles as the localization key of the user-facing message.
 */
export default abstract class CustomError<T = Record<string, unknown>, M extends string = string> extends Error {
	public abstract readonly name: string;
	public readonly status: number;
	public readonly errorKey: M;
	public readonly data?: T;

	constructor(status: number, errorKey: M, message: string, data?: T) {
		super(message);
		this.status = status;
		this.errorKey = errorKey;
		this.data = data;
		if (Error.captureStackTrace) Error.captureStackTrace(this, this.constructor);
	}

	toJSON(): CustomErrorJSON<T, M> {
		return {
			name: this.name,
			status: this.status,
			errorKey: this.errorKey,
			message: this.message,
			data: this.data,
		};
	}
}

