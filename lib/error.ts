import { CONNECTION_ERRORS, INVALID_TYPE_MARKER } from "./const.js";

/**
 * Base class for problems talking to MPD through `mpc`.
 * `message` is short enough for a launcher item title; `reason`
 * is the longer explanation shown underneath it.
 */
export class MpcError extends Error {
	/** Explanation or hint for the user. */
	reason: string;

	constructor(message: string, reason = "") {
		super(message);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		this.name = "MpcError";
		this.reason = reason;
	}
}

/**
 * `mpc` exited with a non-zero status and the error wasn't recognized.
 */
export class CommandFailedError extends MpcError {
	/** The full argv `mpc` was run with. */
	readonly argv: string[];
	readonly exitCode: number;

	constructor(argv: string[], exitCode: number, reason = "") {
		super(`MPD error (${exitCode})`, reason);
		this.name = "CommandFailedError";
		this.argv = argv;
		this.exitCode = exitCode;
	}
}

export class ConnectionError extends MpcError {
	constructor(reason = "Are your host & port settings correct? Is MPD running?") {
		super("Can't connect to MPD", reason);
		this.name = "ConnectionError";
	}
}

/**
 * The `mpc` executable could not be started.
 */
export class ExecutableNotFoundError extends MpcError {
	readonly executable: string;

	constructor(executable: string) {
		super(
			`Can't find ${executable}`,
			"Install mpc or set the MPC variable to its full path",
		);
		this.name = "ExecutableNotFoundError";
		this.executable = executable;
	}
}

/**
 * MPD rejected a search type. The server lists the valid types in the
 * message, e.g. `"foo" is not a valid search type: <any|artist|album>`.
 */
export class InvalidTypeError extends MpcError {
	/** The rejected type. */
	readonly what: string;
	/** Every type the server accepts. */
	readonly valid: string[];

	constructor(err: string) {
		const [what, valid] = InvalidTypeError.parse(err);
		super(
			"Invalid search type",
			`"${what}" is not a valid type. Choose from ${valid.join(", ")}`,
		);
		this.name = "InvalidTypeError";
		this.what = what;
		this.valid = valid;
	}

	private static parse(err: string): [string, string[]] {
		const match = err.match(/"(.*?)" is not a valid search type: <(.+)>/);
		if (!match) {
			throw new Error(`Could not parse MPD error: ${JSON.stringify(err)}`);
		}
		return [match[1], match[2].split("|")];
	}
}

/**
 * An action key passed back by the launcher could not be decoded.
 */
export class ActionError extends MpcError {
	constructor(arg: string, reason = "") {
		super(`Invalid action: ${arg}`, reason);
		this.name = "ActionError";
	}
}

/**
 * Strips the prefix `mpc` puts in front of server errors.
 * Example: "mpd error: Connection refused" -> "Connection refused"
 */
export const cleanErrorMessage = (stderr: string): string => {
	const text = stderr.trim();
	const match = text.match(/^(?:mpd )?error:\s*(.*)$/is);
	return match ? match[1].trim() : text;
};

/**
 * Maps the stderr output of a failed `mpc` run to the matching error.
 * @param argv - The arguments `mpc` was run with.
 * @param exitCode - The non-zero exit status.
 * @param stderr - Raw stderr output.
 */
export const toMpcError = (
	argv: string[],
	exitCode: number,
	stderr: string,
): MpcError => {
	const err = cleanErrorMessage(stderr);

	if (CONNECTION_ERRORS.some((marker) => err.includes(marker))) {
		return new ConnectionError();
	}

	if (err.includes(INVALID_TYPE_MARKER)) {
		return new InvalidTypeError(err);
	}

	return new CommandFailedError(argv, exitCode, err);
};
