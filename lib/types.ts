import type { SEARCH_TYPES, TRACK_FIELDS } from "./const.js";

export type TrackField = (typeof TRACK_FIELDS)[number];
export type SearchType = (typeof SEARCH_TYPES)[number];

/** A song as described by the `mpc -f` track format. */
export type Track = Record<TrackField, string>;

export type PlayerState = "play" | "pause" | "stop";

/** Player status as reported by `mpc status`. */
export interface Status {
	/** The current song, absent when the player is stopped. */
	track?: Track;
	state: PlayerState;
	/** 1-based position of the current song in the queue. */
	position?: number;
	/** Length of the queue, only reported while a song is loaded. */
	total?: number;
	/** e.g. "1:23" */
	elapsed?: string;
	/** e.g. "4:56" */
	duration?: string;
	/** Progress through the current song, in percent. */
	progress?: number;
	/** Mixer volume in percent, absent when the output has no mixer ("n/a"). */
	volume?: number;
	repeat: boolean;
	random: boolean;
	single: boolean | "once";
	consume: boolean | "once";
}

/** Library statistics as reported by `mpc stats`. */
export interface Stats {
	artists: number;
	albums: number;
	songs: number;
	playTime?: string;
	uptime?: string;
	dbUpdated?: string;
	dbPlayTime?: string;
}

/** An audio output as listed by `mpc outputs`. */
export interface Output {
	id: number;
	name: string;
	enabled: boolean;
}

/** One `type value` pair of an MPD search. */
export interface FieldFilter {
	field: SearchType;
	value: string;
}

/** Result of running `mpc`. */
export interface ProcessResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}
