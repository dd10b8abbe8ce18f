import type { ResolvedConfig } from "./config.js";

/**
 * Represents an `mpc` sub-command with a name and arguments.
 * Provides a helper method to create instances and a method to turn the
 * command into the argv `mpc` is spawned with.
 */
export class Command {
	readonly name: string;
	readonly args: (string | number)[];

	/**
	 * Creates an instance of Command.
	 * Allows arguments to be passed either as individual arguments or as a single array.
	 * @param name - The name of the mpc command (e.g., 'status', 'search').
	 * @param args - The arguments for the command. Can be passed as rest parameters (`...args`) or as a single array (`[arg1, arg2]`).
	 */
	constructor(
		name: string,
		...inputArgs: (string | number)[] | [(string | number)[]]
	) {
		const args: (string | number)[] = [];
		for (const arg of inputArgs) {
			if (Array.isArray(arg)) {
				args.push(...arg);
			} else {
				args.push(arg);
			}
		}
		this.args = args;
		this.name = name;
	}

	/**
	 * Static factory method to create Command instances using a single array for arguments.
	 */
	static cmd(name: string, args: (string | number)[]): Command;
	/**
	 * Static factory method to create Command instances using rest parameters for arguments.
	 */
	static cmd(name: string, ...args: (string | number)[]): Command;
	static cmd(
		name: string,
		...argsOrArray: [(string | number)[]] | (string | number)[]
	): Command {
		return new Command(name, ...argsOrArray);
	}

	/**
	 * Builds the arguments `mpc` is spawned with. Connection options come
	 * first, then global options such as `-f <format>`, then the command.
	 * A password is passed the way mpc expects it, as `password@host`.
	 * @param config - Resolved connection settings.
	 * @param opts - Global options placed before the command name.
	 */
	toArgv(
		config: Pick<ResolvedConfig, "host" | "port" | "password">,
		opts: string[] = [],
	): string[] {
		const host = config.password
			? `${config.password}@${config.host}`
			: config.host;
		return [
			"--host",
			host,
			"--port",
			String(config.port),
			...opts,
			this.name,
			...this.args.map(String),
		];
	}

	/** e.g. 'search artist "David Bowie"' */
	toString(): string {
		const quoted = this.args.map((arg) =>
			/\s/.test(`${arg}`) ? JSON.stringify(`${arg}`) : `${arg}`,
		);
		return [this.name, ...quoted].join(" ");
	}
}
