import debugCreator from "debug";
import { Command } from "./command.js";
import {
	type Config,
	type ResolvedConfig,
	applyDefaultValuesIfNotSet,
} from "./config.js";
import { PACKAGE_NAME, RESULT_FORMAT } from "./const.js";
import { InvalidTypeError, toMpcError } from "./error.js";
import {
	parseLines,
	parseOutputs,
	parseStats,
	parseStatus,
	parseTrackList,
	parseVersion,
} from "./parserUtils.js";
import { parseQuery, toMpcArgs } from "./query.js";
import { type ProcessRunner, spawnProcess } from "./runner.js";
import type { Output, PlayerState, Stats, Status, Track } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:mpc`);

/**
 * Talks to MPD by running `mpc` and parsing what it prints.
 * Every method spawns one or more `mpc` processes; nothing is cached.
 */
export class Mpc {
	readonly config: ResolvedConfig;
	private readonly runner: ProcessRunner;

	/**
	 * @param config - Settings; unset values come from the environment.
	 * @param runner - Spawns `mpc`. Defaults to `child_process.spawn`.
	 */
	constructor(config: Config = {}, runner: ProcessRunner = spawnProcess) {
		this.config = applyDefaultValuesIfNotSet(config);
		this.runner = runner;
	}

	/**
	 * Runs an mpc command and returns its stdout.
	 * @param command - The command string or Command object.
	 * @param opts - Global options placed before the command, e.g. `-f <format>`.
	 * @throws {MpcError} If mpc exits with a non-zero status.
	 */
	async run(command: string | Command, opts: string[] = []): Promise<string> {
		const cmd = typeof command === "string" ? new Command(command) : command;
		const argv = cmd.toArgv(this.config, opts);
		debug("Running: %s %o", this.config.mpc, argv);

		const { stdout, stderr, exitCode } = await this.runner(
			this.config.mpc,
			argv,
			{ timeout: this.config.timeout },
		);

		if (exitCode !== 0) {
			const error = toMpcError([this.config.mpc, ...argv], exitCode, stderr);
			debug("Command failed: %s (%s)", error.message, error.reason);
			throw error;
		}

		return stdout;
	}

	/** Runs a command that lists tracks and parses them. */
	async tracks(command: string | Command): Promise<Track[]> {
		const out = await this.run(command, ["-f", RESULT_FORMAT]);
		return parseTrackList(out, this.config.maxResults);
	}

	/** The current track, if any. */
	async current(): Promise<Track | undefined> {
		const [track] = await this.tracks("current");
		return track;
	}

	/** MPD's version, e.g. "0.23.5". */
	async version(): Promise<string> {
		return parseVersion(await this.run("version"));
	}

	/** Tracks in the play queue, in order. */
	async queue(): Promise<Track[]> {
		return this.tracks("playlist");
	}

	async status(): Promise<Status> {
		return parseStatus(await this.run("status", ["-f", RESULT_FORMAT]));
	}

	/** Number of tracks in the queue, ignoring `maxResults`. */
	async queueLength(): Promise<number> {
		const out = await this.run("playlist", ["-f", RESULT_FORMAT]);
		return parseTrackList(out).length;
	}

	async playing(): Promise<boolean> {
		const { state } = await this.status();
		return state === "play";
	}

	/** Names of the stored playlists. */
	async playlists(): Promise<string[]> {
		return parseLines(await this.run("lsplaylists"));
	}

	/** Tracks matching a query, case-insensitive substring match. */
	async search(query: string): Promise<Track[]> {
		const filters = parseQuery(query);
		if (filters.length === 0) return [];
		return this.tracks(Command.cmd("search", toMpcArgs(filters)));
	}

	/** Tracks *exactly* matching a query. */
	async find(query: string): Promise<Track[]> {
		const filters = parseQuery(query);
		if (filters.length === 0) return [];
		return this.tracks(Command.cmd("find", toMpcArgs(filters)));
	}

	/**
	 * Search types the server accepts. mpc has no command to list them,
	 * so this provokes an InvalidTypeError and reads the list from it.
	 */
	async types(): Promise<string[]> {
		try {
			await this.run(Command.cmd("search", "whereverwhenever", "shakira!"));
		} catch (error) {
			if (error instanceof InvalidTypeError) {
				return error.valid;
			}
			throw error;
		}
		return [];
	}

	async stats(): Promise<Stats> {
		return parseStats(await this.run("stats"));
	}

	/**
	 * Pauses if playing, otherwise starts playback.
	 * @returns The state the player was switched to.
	 */
	async playPause(): Promise<PlayerState> {
		if (await this.playing()) {
			await this.run("pause");
			return "pause";
		}
		await this.run("play");
		return "play";
	}

	/**
	 * Starts playback.
	 * @param position - 1-based queue position; the current song if omitted.
	 */
	async play(position?: number): Promise<void> {
		await this.run(
			position === undefined ? "play" : Command.cmd("play", position),
		);
	}

	async pause(): Promise<void> {
		await this.run("pause");
	}

	async stop(): Promise<void> {
		await this.run("stop");
	}

	async next(): Promise<void> {
		await this.run("next");
	}

	async previous(): Promise<void> {
		await this.run("prev");
	}

	/** Empties the queue. */
	async clear(): Promise<void> {
		await this.run("clear");
	}

	/** Appends a file (or directory) to the queue. */
	async add(file: string): Promise<void> {
		await this.run(Command.cmd("add", file));
	}

	async queueTrack(track: Pick<Track, "file">): Promise<void> {
		await this.add(track.file);
	}

	/** Appends a track to the queue and plays it. */
	async playTrack(track: Pick<Track, "file">): Promise<void> {
		const length = await this.queueLength();
		await this.add(track.file);
		await this.play(length + 1);
	}

	/**
	 * Appends every track of an album to the queue.
	 * @param artist - Only tracks by this artist, to tell apart albums
	 * sharing a name.
	 */
	async queueAlbum(album: string, artist?: string): Promise<void> {
		const args = ["album", album];
		if (artist) args.push("artist", artist);
		await this.run(Command.cmd("findadd", args));
	}

	/** Appends an album to the queue and plays its first track. */
	async playAlbum(album: string, artist?: string): Promise<void> {
		const length = await this.queueLength();
		await this.queueAlbum(album, artist);
		await this.play(length + 1);
	}

	/**
	 * Removes a track from the queue.
	 * @param position - 1-based queue position.
	 */
	async unqueue(position: number): Promise<void> {
		await this.run(Command.cmd("del", position));
	}

	/** Appends a stored playlist to the queue. */
	async loadPlaylist(name: string): Promise<void> {
		await this.run(Command.cmd("load", name));
	}

	async outputs(): Promise<Output[]> {
		return parseOutputs(await this.run("outputs"));
	}

	async toggleOutput(id: number): Promise<void> {
		await this.run(Command.cmd("toggleoutput", id));
	}
}
