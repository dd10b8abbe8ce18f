/**
 * Runtime configuration. Alfred hands workflow variables to the script
 * as environment variables, so every value can be set there.
 */
export interface Config {
	/** Path or name of the `mpc` executable. Defaults to `mpc`. */
	mpc?: string;
	/** MPD host. Defaults to `localhost`. */
	host?: string;
	/** MPD port. Defaults to 6600. */
	port?: number;
	/** MPD server password. */
	password?: string;
	/** Milliseconds before an `mpc` run is killed. Defaults to 5000. */
	timeout?: number;
	/** Maximum number of tracks read from `mpc`; 0 reads all. Defaults to 0. */
	maxResults?: number;
}

export type ResolvedConfig = Required<Omit<Config, "password">> &
	Pick<Config, "password">;

const toNumber = (val: string | undefined): number | undefined => {
	if (val === undefined || val.trim() === "") return undefined;
	const num = Number(val);
	return Number.isNaN(num) ? undefined : num;
};

/**
 * Applies default values to the configuration object if they are not set.
 * Reads defaults from environment variables (MPC, MPD_HOST, MPD_PORT,
 * MPD_PASSWORD, MPD_TIMEOUT, MAX_RESULTS) or uses hardcoded values.
 * @param config - Explicit settings; these win over the environment.
 * @param env - Defaults to `process.env`.
 */
export function applyDefaultValuesIfNotSet(
	config: Config = {},
	env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
	return {
		mpc: config.mpc ?? (env.MPC || "mpc"),
		host: config.host ?? (env.MPD_HOST || "localhost"),
		port: config.port ?? toNumber(env.MPD_PORT) ?? 6600,
		password: config.password ?? (env.MPD_PASSWORD || undefined),
		timeout: config.timeout ?? toNumber(env.MPD_TIMEOUT) ?? 5000,
		maxResults: config.maxResults ?? toNumber(env.MAX_RESULTS) ?? 0,
	};
}
