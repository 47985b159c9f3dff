import CustomError from "../CustomError.js";

export class ArgumentError extends CustomError<{ argument: string }, "INVALID_ARGUMENT"> {
	public readonly name = "ArgumentError";

	constructor(argument: string, message = `Argumento inválido: ${argument}`) {
		super(400, "INVALID_ARGUMENT", message, { argument });
	}
}
