import { spawn } from "node:child_process";
import { StringDecoder } from "node:string_decoder";
import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";
import { ExecutableNotFoundError } from "./error.js";
import type { ProcessResult } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:runner`);

export interface RunOptions {
	/** Milliseconds before the process is killed. */
	timeout: number;
}

/**
 * Runs an executable and resolves with its output once it exits.
 * Resolves for any exit status; rejects only if the process can't run.
 */
export type ProcessRunner = (
	executable: string,
	argv: string[],
	options: RunOptions,
) => Promise<ProcessResult>;

/**
 * Default runner backed by `child_process.spawn`.
 * stdout and stderr are read concurrently and decoded as UTF-8,
 * the only encoding MPD uses.
 */
export const spawnProcess: ProcessRunner = (executable, argv, options) => {
	return new Promise((resolve, reject) => {
		const started = Date.now();
		const child = spawn(executable, argv, {
			stdio: ["ignore", "pipe", "pipe"],
		});

		const outDecoder = new StringDecoder("utf8");
		const errDecoder = new StringDecoder("utf8");
		let stdout = "";
		let stderr = "";
		let timedOut = false;

		const timer = setTimeout(() => {
			timedOut = true;
			child.kill("SIGTERM");
		}, options.timeout);

		child.stdout.on("data", (chunk: Buffer) => {
			stdout += outDecoder.write(chunk);
		});
		child.stderr.on("data", (chunk: Buffer) => {
			stderr += errDecoder.write(chunk);
		});

		child.once("error", (err: NodeJS.ErrnoException) => {
			clearTimeout(timer);
			if (err.code === "ENOENT") {
				reject(new ExecutableNotFoundError(executable));
				return;
			}
			reject(err);
		});

		child.once("close", (code) => {
			clearTimeout(timer);
			stdout += outDecoder.end();
			stderr += errDecoder.end();
			if (timedOut) {
				stderr = `${stderr}Timed out after ${options.timeout}ms`;
			}
			debug("%s exited %s in %dms", executable, code, Date.now() - started);
			resolve({ stdout, stderr, exitCode: code ?? 1 });
		});
	});
};
