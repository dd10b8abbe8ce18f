import { describe, expect, it } from "vitest";
import { applyDefaultValuesIfNotSet } from "../lib/config.js";

describe("applyDefaultValuesIfNotSet", () => {
	it("should use built-in defaults with an empty environment", () => {
		expect(applyDefaultValuesIfNotSet({}, {})).toEqual({
			mpc: "mpc",
			host: "localhost",
			port: 6600,
			password: undefined,
			timeout: 5000,
			maxResults: 0,
		});
	});

	it("should read the environment", () => {
		const env = {
			MPC: "/opt/homebrew/bin/mpc",
			MPD_HOST: "music.local",
			MPD_PORT: "6601",
			MPD_PASSWORD: "test-secret",
			MPD_TIMEOUT: "2000",
			MAX_RESULTS: "50",
		};
		expect(applyDefaultValuesIfNotSet({}, env)).toEqual({
			mpc: "/opt/homebrew/bin/mpc",
			host: "music.local",
			port: 6601,
			password: "test-secret",
			timeout: 2000,
			maxResults: 50,
		});
	});

	it("should prefer explicit settings over the environment", () => {
		const config = applyDefaultValuesIfNotSet(
			{ host: "studio.local", maxResults: 10 },
			{ MPD_HOST: "music.local", MAX_RESULTS: "50" },
		);
		expect(config.host).toBe("studio.local");
		expect(config.maxResults).toBe(10);
	});

	it("should ignore empty and non-numeric values", () => {
		const config = applyDefaultValuesIfNotSet(
			{},
			{ MPC: "", MPD_PORT: "sixty-six", MPD_TIMEOUT: " ", MPD_PASSWORD: "" },
		);
		expect(config.mpc).toBe("mpc");
		expect(config.port).toBe(6600);
		expect(config.timeout).toBe(5000);
		expect(config.password).toBeUndefined();
	});
});
