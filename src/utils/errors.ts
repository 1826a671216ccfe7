/**
 * Errors raised by administrative commands.
 * Each one aborts only the command that raised it; the router turns it into
 * the reply shown to the issuer and no store is touched.
 *
 * @module utils/errors
 */

export type CommandErrorCode =
	| "UNAUTHORIZED"
	| "UNRESOLVED_TARGET"
	| "INVALID_INPUT";

export class CommandError extends Error {
	public code: CommandErrorCode;

	constructor(message: string, code: CommandErrorCode) {
		super(message);
		this.code = code;
		this.name = "CommandError";
		Error.captureStackTrace(this, this.constructor);
	}
}

/** A non-privileged member invoked a privileged command */
export class UnauthorizedError extends CommandError {
	constructor(message = "❌ Only admins can use this command.") {
		super(message, "UNAUTHORIZED");
		this.name = "UnauthorizedError";
	}
}

/** The command could not work out which member it addresses */
export class UnresolvedTargetError extends CommandError {
	constructor(
		message = "❌ Please specify a user by replying, mentioning, or providing user ID.",
	) {
		super(message, "UNRESOLVED_TARGET");
		this.name = "UnresolvedTargetError";
	}
}

/** Malformed or out-of-range arguments; the message carries the usage text */
export class InvalidInputError extends CommandError {
	constructor(message: string) {
		super(message, "INVALID_INPUT");
		this.name = "InvalidInputError";
	}
}

export const isCommandError = (error: unknown): error is CommandError =>
	error instanceof CommandError;

/** Normalizes anything thrown by a platform client into an Error */
export const toError = (error: unknown): Error =>
	error instanceof Error ? error : new Error(String(error));
