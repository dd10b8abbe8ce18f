import { posix } from "node:path";
import { ICON_ERROR } from "./const.js";
import { MpcError } from "./error.js";
import type { Track } from "./types.js";

export interface AlfredIcon {
	path: string;
	type?: "fileicon" | "filetype";
}

/** Overrides applied while a modifier key is held. */
export interface AlfredModifier {
	arg?: string;
	subtitle?: string;
	valid?: boolean;
}

export type ModifierKey = "cmd" | "alt" | "ctrl" | "shift" | "fn";

/**
 * One row of Alfred's Script Filter output.
 * c.f. https://www.alfredapp.com/help/workflows/inputs/script-filter/json/
 */
export interface AlfredItem {
	/** Lets Alfred learn which items get picked. */
	uid?: string;
	title: string;
	subtitle?: string;
	/** Passed to the next workflow object when the item is actioned. */
	arg?: string;
	/** Replaces the query when the user hits Tab. */
	autocomplete?: string;
	/** Defaults to true in Alfred. */
	valid?: boolean;
	icon?: AlfredIcon;
	mods?: Partial<Record<ModifierKey, AlfredModifier>>;
	text?: { copy?: string; largetype?: string };
}

export interface ScriptFilterResponse {
	items: AlfredItem[];
}

export const toResponse = (items: AlfredItem[]): ScriptFilterResponse => ({
	items,
});

/** Serializes items to the JSON Alfred reads from stdout. */
export const serialize = (items: AlfredItem[]): string =>
	JSON.stringify(toResponse(items));

/** The track's title, or its file name for untagged files. */
export const trackTitle = (track: Track): string =>
	track.title || posix.basename(track.file);

/** e.g. "David Bowie – Low" */
export const trackSubtitle = (track: Track): string =>
	[track.artist, track.album].filter(Boolean).join(" – ");

/**
 * An item that only shows information and can't be actioned.
 */
export function infoItem(
	title: string,
	subtitle?: string,
	icon?: string,
): AlfredItem {
	return {
		title,
		subtitle,
		valid: false,
		icon: icon ? { path: icon } : undefined,
	};
}

/**
 * Shows an error as a single launcher row.
 * MpcError carries a user-facing reason for the subtitle.
 */
export function errorItem(error: unknown): AlfredItem {
	if (error instanceof MpcError) {
		return infoItem(error.message, error.reason, ICON_ERROR);
	}
	if (error instanceof Error) {
		return infoItem(error.message, error.name, ICON_ERROR);
	}
	return infoItem(String(error), undefined, ICON_ERROR);
}
