import debugCreator from "debug";
import { DELIMITER, PACKAGE_NAME, TRACK_FIELDS } from "./const.js";
import type { Output, PlayerState, Stats, Status, Track } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:parserUtils`);

export const isString = (val: unknown): val is string =>
	typeof val === "string";

export const isNumber = (val: unknown): val is number =>
	typeof val === "number";

export const isNonEmptyString = (val: unknown): val is string =>
	isString(val) && !!val.trim().length;

/**
 * Parses a raw line into a key-value pair, splitting on the first colon.
 * Returns undefined if the line doesn't contain a colon.
 * Example: "Artists:   123" -> ["Artists", "123"]
 */
export function parseLineToKeyValue(
	line: string,
): [string, string] | undefined {
	const idx = line.indexOf(":");
	if (idx === -1) {
		return undefined;
	}
	const key = line.substring(0, idx).trim();
	const val = line.substring(idx + 1).trim();
	return [key, val];
}

/** Normalizes keys (e.g., "DB Play Time" -> "dbPlayTime"). */
export const normalizeKey = (key: string): string => {
	return key
		.trim()
		.toLowerCase()
		.replace(/[-_\s]+([a-z0-9])/g, (_, char: string) => char.toUpperCase());
};

export const parsers = {
	parseNumber: (num: unknown): number | undefined => {
		if (num === null || num === undefined) return undefined;
		if (isNumber(num)) return num;
		if (!isString(num)) return undefined;
		if (num.trim() === "") return undefined;

		const val = Number(num);
		return Number.isNaN(val) ? undefined : val;
	},

	/** Parses mpc's "on"/"off"/"once" switches. */
	parseSwitch: (val: unknown): boolean | "once" | undefined => {
		if (!isString(val)) return undefined;
		const lowerVal = val.toLowerCase().trim();
		if (lowerVal === "on") return true;
		if (lowerVal === "off") return false;
		if (lowerVal === "once" || lowerVal === "oneshot") return "once";
		return undefined;
	},

	/** Maps the bracketed mpc state ("playing", "paused") to MPD's state names. */
	parseState: (val: unknown): PlayerState | undefined => {
		if (!isString(val)) return undefined;
		switch (val.toLowerCase().trim()) {
			case "playing":
			case "play":
				return "play";
			case "paused":
			case "pause":
				return "pause";
			case "stopped":
			case "stop":
				return "stop";
			default:
				return undefined;
		}
	},
};

/**
 * Parses one line of `mpc -f RESULT_FORMAT` output into a Track.
 * Returns undefined if the line doesn't carry every field.
 */
export function parseTrackLine(line: string): Track | undefined {
	const values = line.split(DELIMITER);
	if (values.length !== TRACK_FIELDS.length) {
		return undefined;
	}
	const [artist, album, disc, track, title, file] = values;
	return { artist, album, disc, track, title, file };
}

/**
 * Parses `mpc -f RESULT_FORMAT` output into a list of tracks.
 * @param out - Raw stdout.
 * @param maxResults - Stop after this many tracks; 0 reads all.
 */
export function parseTrackList(out: string, maxResults = 0): Track[] {
	const tracks: Track[] = [];
	const lines = out.split(/\r?\n/).filter((line) => line.trim() !== "");
	for (const line of lines) {
		const track = parseTrackLine(line);
		if (!track) {
			debug("Ignoring line without track fields: %o", line);
			continue;
		}
		tracks.push(track);
		if (maxResults > 0 && tracks.length >= maxResults) {
			debug("Truncated results to %d/%d", maxResults, lines.length);
			break;
		}
	}
	return tracks;
}

// [playing] #3/12   1:23/4:56 (28%)
const PLAYBACK_LINE =
	/^\[([a-z]+)\]\s+#(\d+)\/(\d+)\s+(\S+)\/(\S+)\s+\((\d+)%\)/;
// volume: 80%   repeat: off   random: on   single: off   consume: off
const OPTION_PAIR = /([a-z]+):\s*(\S+)/g;

/**
 * Parses `mpc -f RESULT_FORMAT status` output.
 * A stopped player only prints the options line.
 */
export function parseStatus(out: string): Status {
	const status: Status = {
		state: "stop",
		repeat: false,
		random: false,
		single: false,
		consume: false,
	};

	const lines = out.split(/\r?\n/).filter((line) => line.trim() !== "");
	lines.forEach((line, i) => {
		const playback = line.match(PLAYBACK_LINE);
		if (playback) {
			const [, state, pos, total, elapsed, duration, progress] = playback;
			status.state = parsers.parseState(state) ?? "stop";
			status.position = parsers.parseNumber(pos);
			status.total = parsers.parseNumber(total);
			status.elapsed = elapsed;
			status.duration = duration;
			status.progress = parsers.parseNumber(progress);
			return;
		}

		if (line.startsWith("volume:")) {
			for (const [, key, value] of line.matchAll(OPTION_PAIR)) {
				switch (key) {
					case "volume":
						status.volume = parsers.parseNumber(value.replace(/%$/, ""));
						break;
					case "repeat":
						status.repeat = parsers.parseSwitch(value) === true;
						break;
					case "random":
						status.random = parsers.parseSwitch(value) === true;
						break;
					case "single":
						status.single = parsers.parseSwitch(value) ?? false;
						break;
					case "consume":
						status.consume = parsers.parseSwitch(value) ?? false;
						break;
				}
			}
			return;
		}

		if (i === 0) {
			status.track = parseTrackLine(line);
		}
	});

	debug("status=%o", status);
	return status;
}

/**
 * Parses `mpc stats` output. Missing counts are 0.
 */
export function parseStats(out: string): Stats {
	const stats: Stats = { artists: 0, albums: 0, songs: 0 };
	for (const line of out.split(/\r?\n/)) {
		const kvPair = parseLineToKeyValue(line);
		if (!kvPair) continue;
		const [rawKey, value] = kvPair;
		switch (normalizeKey(rawKey)) {
			case "artists":
				stats.artists = parsers.parseNumber(value) ?? 0;
				break;
			case "albums":
				stats.albums = parsers.parseNumber(value) ?? 0;
				break;
			case "songs":
				stats.songs = parsers.parseNumber(value) ?? 0;
				break;
			case "playTime":
				stats.playTime = value;
				break;
			case "uptime":
				stats.uptime = value;
				break;
			case "dbUpdated":
				stats.dbUpdated = value;
				break;
			case "dbPlayTime":
				stats.dbPlayTime = value;
				break;
		}
	}
	return stats;
}

const OUTPUT_LINE = /^Output (\d+) \((.*)\) is (enabled|disabled)$/;

/**
 * Parses `mpc outputs` output.
 * Example: "Output 2 (HTTP stream) is disabled"
 */
export function parseOutputs(out: string): Output[] {
	const outputs: Output[] = [];
	for (const line of out.split(/\r?\n/)) {
		const match = line.trim().match(OUTPUT_LINE);
		if (!match) continue;
		outputs.push({
			id: Number(match[1]),
			name: match[2],
			enabled: match[3] === "enabled",
		});
	}
	return outputs;
}

/**
 * Parses `mpc version` output.
 * Example: "mpd version: 0.23.5" -> "0.23.5"
 */
export function parseVersion(out: string): string {
	return out.split(":").at(-1)?.trim() ?? "";
}

/** Splits output that carries one entry per line, e.g. `mpc lsplaylists`. */
export function parseLines(out: string): string[] {
	return out
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter(isNonEmptyString);
}
