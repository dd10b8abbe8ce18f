import debugCreator from "debug";
import { type Action, decodeAction, encodeAction, runAction } from "./actions.js";
import {
	type AlfredItem,
	errorItem,
	infoItem,
	trackSubtitle,
	trackTitle,
} from "./alfred.js";
import { ICON_INFO, ICON_WARNING, PACKAGE_NAME } from "./const.js";
import type { Mpc } from "./mpc.js";
import { formatQuery, parseQuery } from "./query.js";
import type { FieldFilter, Output, Status, Track } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:workflow`);

const STATE_LABELS: Record<Status["state"], string> = {
	play: "playing",
	pause: "paused",
	stop: "stopped",
};

const withArg = (item: Omit<AlfredItem, "arg">, action: Action): AlfredItem => ({
	...item,
	arg: encodeAction(action),
});

/** Query that lists the track's album (or artist) when tab-completed. */
export function browseQuery(track: Track): string | undefined {
	const filters: FieldFilter[] = [];
	if (track.album) {
		filters.push({ field: "album", value: track.album });
	}
	if (track.artist) {
		filters.push({ field: "artist", value: track.artist });
	}
	return filters.length > 0 ? `${formatQuery(filters)} ` : undefined;
}

/**
 * A track row: ↩ queues it, ⌘↩ plays it, ⌥↩ queues its album,
 * ⌃↩ plays its album, Tab browses its album.
 */
export function trackItem(track: Track): AlfredItem {
	const title = trackTitle(track);
	const item: AlfredItem = withArg(
		{
			uid: track.file,
			title,
			subtitle: trackSubtitle(track),
			autocomplete: browseQuery(track),
			mods: {
				cmd: {
					arg: encodeAction({ action: "play", file: track.file, title }),
					subtitle: `Play "${title}"`,
				},
			},
			text: {
				copy: [track.artist, title].filter(Boolean).join(" – "),
				largetype: title,
			},
		},
		{ action: "queue", file: track.file, title },
	);

	if (track.album && item.mods) {
		const album = { album: track.album, artist: track.artist || undefined };
		item.mods.alt = {
			arg: encodeAction({ action: "queue-album", ...album }),
			subtitle: `Queue album "${track.album}"`,
		};
		item.mods.ctrl = {
			arg: encodeAction({ action: "play-album", ...album }),
			subtitle: `Play album "${track.album}"`,
		};
	}

	return item;
}

/** e.g. "[playing] #3/12 · 1:23/4:56 · 28%" */
export function describeStatus(status: Status): string {
	const parts = [`[${STATE_LABELS[status.state]}]`];
	if (status.position !== undefined && status.total !== undefined) {
		parts.push(`#${status.position}/${status.total}`);
	}
	if (status.elapsed && status.duration) {
		parts.push(`${status.elapsed}/${status.duration}`);
	}
	if (status.volume !== undefined) {
		parts.push(`volume ${status.volume}%`);
	}
	return parts.join(" · ");
}

/**
 * Builds launcher items from `mpc` output. Each view catches its own
 * errors and shows them as a single item, so a view never throws.
 */
export class Workflow {
	private readonly mpc: Mpc;

	constructor(mpc: Mpc) {
		this.mpc = mpc;
	}

	private async safely(
		view: string,
		build: () => Promise<AlfredItem[]>,
	): Promise<AlfredItem[]> {
		try {
			return await build();
		} catch (error) {
			debug("%s view failed: %o", view, error);
			return [errorItem(error)];
		}
	}

	/**
	 * Searches the library. An empty query shows the player status instead.
	 */
	async search(query: string): Promise<AlfredItem[]> {
		if (parseQuery(query).length === 0) {
			return this.status();
		}

		return this.safely("search", async () => {
			const tracks = await this.mpc.search(query);
			debug("%d track(s) for %o", tracks.length, query);
			if (tracks.length === 0) {
				return [infoItem("No matching tracks", query.trim(), ICON_WARNING)];
			}
			return tracks.map(trackItem);
		});
	}

	/** Current track, transport controls and library statistics. */
	async status(): Promise<AlfredItem[]> {
		return this.safely("status", async () => {
			const status = await this.mpc.status();
			const stats = await this.mpc.stats();
			const items: AlfredItem[] = [];

			if (status.track) {
				const { track } = status;
				items.push(
					withArg(
						{
							title: trackTitle(track),
							subtitle: [describeStatus(status), trackSubtitle(track)]
								.filter(Boolean)
								.join(" · "),
							autocomplete: browseQuery(track),
						},
						{ action: "playpause" },
					),
				);
			} else {
				items.push(
					withArg(
						{
							title: "Not playing",
							subtitle: `${describeStatus(status)} · ↩ to start playback`,
						},
						{ action: "playpause" },
					),
				);
			}

			items.push(
				withArg({ title: "Next track" }, { action: "next" }),
				withArg({ title: "Previous track" }, { action: "previous" }),
				infoItem(
					`${stats.artists} artists, ${stats.albums} albums, ${stats.songs} songs`,
					`MPD at ${this.mpc.config.host}:${this.mpc.config.port}`,
					ICON_INFO,
				),
			);
			return items;
		});
	}

	/**
	 * Lists the play queue: ↩ plays a track, ⌘↩ removes it.
	 * @param filter - Case-insensitive text matched against artist, album and title.
	 */
	async queue(filter = ""): Promise<AlfredItem[]> {
		return this.safely("queue", async () => {
			const tracks = await this.mpc.queue();
			if (tracks.length === 0) {
				return [infoItem("Queue is empty", undefined, ICON_WARNING)];
			}

			const needle = filter.trim().toLowerCase();
			const matches: AlfredItem[] = [];
			tracks.forEach((track, i) => {
				const position = i + 1;
				const haystack = [track.artist, track.album, track.title]
					.join(" ")
					.toLowerCase();
				if (needle && !haystack.includes(needle)) {
					return;
				}
				matches.push(
					withArg(
						{
							title: `${position}. ${trackTitle(track)}`,
							subtitle: trackSubtitle(track),
							mods: {
								cmd: {
									arg: encodeAction({ action: "unqueue", position }),
									subtitle: "Remove from queue",
								},
							},
						},
						{ action: "play-position", position },
					),
				);
			});
			if (matches.length === 0) {
				return [infoItem("No matching tracks", filter.trim(), ICON_WARNING)];
			}

			// maxResults may have cut the listing short
			const { maxResults } = this.mpc.config;
			const total =
				maxResults > 0 && tracks.length >= maxResults
					? await this.mpc.queueLength()
					: tracks.length;
			return [
				withArg(
					{ title: "Clear queue", subtitle: `Remove all ${total} track(s)` },
					{ action: "clear" },
				),
				...matches,
			];
		});
	}

	/** Lists audio outputs; ↩ toggles one. */
	async outputs(): Promise<AlfredItem[]> {
		return this.safely("outputs", async () => {
			const outputs = await this.mpc.outputs();
			if (outputs.length === 0) {
				return [infoItem("No outputs", undefined, ICON_WARNING)];
			}
			return outputs.map((output: Output) =>
				withArg(
					{
						uid: `output-${output.id}`,
						title: output.name,
						subtitle: output.enabled
							? "Enabled · ↩ to disable"
							: "Disabled · ↩ to enable",
					},
					{ action: "toggle-output", id: output.id, name: output.name },
				),
			);
		});
	}

	/** Lists stored playlists; ↩ appends one to the queue. */
	async playlists(filter = ""): Promise<AlfredItem[]> {
		return this.safely("playlists", async () => {
			const needle = filter.trim().toLowerCase();
			const names = (await this.mpc.playlists()).filter((name) =>
				name.toLowerCase().includes(needle),
			);
			if (names.length === 0) {
				return [infoItem("No playlists", filter.trim() || undefined, ICON_WARNING)];
			}
			return names.map((name) =>
				withArg(
					{ uid: `playlist-${name}`, title: name, subtitle: "Load playlist" },
					{ action: "load-playlist", name },
				),
			);
		});
	}

	/** Lists search types; Tab starts a `type:` query. */
	async types(): Promise<AlfredItem[]> {
		return this.safely("types", async () => {
			const types = await this.mpc.types();
			return types.map((type) => ({
				title: type,
				subtitle: `Search by ${type}`,
				autocomplete: `${type}:`,
				valid: false,
			}));
		});
	}

	/**
	 * Decodes and executes an action key.
	 * @returns The notification message.
	 * @throws {MpcError} If the key is malformed or mpc fails.
	 */
	async run(arg: string): Promise<string> {
		return runAction(this.mpc, decodeAction(arg));
	}
}
