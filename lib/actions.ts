import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";
import { ActionError } from "./error.js";
import type { Mpc } from "./mpc.js";
import { isNonEmptyString, isNumber, isString } from "./parserUtils.js";

const debug = debugCreator(`${PACKAGE_NAME}:actions`);

/**
 * What happens when a launcher item is actioned. Items carry the
 * JSON-encoded action in their `arg`; `run <arg>` executes it.
 */
export type Action =
	| { action: "queue"; file: string; title?: string }
	| { action: "play"; file: string; title?: string }
	| { action: "queue-album"; album: string; artist?: string }
	| { action: "play-album"; album: string; artist?: string }
	| { action: "play-position"; position: number }
	| { action: "unqueue"; position: number }
	| { action: "playpause" }
	| { action: "next" }
	| { action: "previous" }
	| { action: "stop" }
	| { action: "clear" }
	| { action: "toggle-output"; id: number; name?: string }
	| { action: "load-playlist"; name: string };

export type ActionName = Action["action"];

export const encodeAction = (action: Action): string => JSON.stringify(action);

const isRecord = (val: unknown): val is Record<string, unknown> =>
	typeof val === "object" && val !== null && !Array.isArray(val);

const optionalString = (val: unknown): string | undefined =>
	isNonEmptyString(val) ? val : undefined;

const isPosition = (val: unknown): val is number =>
	isNumber(val) && Number.isInteger(val) && val > 0;

/**
 * Decodes and validates an action key.
 * @throws {ActionError} If the key isn't JSON or doesn't describe a known action.
 */
export function decodeAction(arg: string): Action {
	let value: unknown;
	try {
		value = JSON.parse(arg);
	} catch (error) {
		throw new ActionError(
			arg,
			error instanceof Error ? error.message : String(error),
		);
	}

	if (!isRecord(value) || !isString(value.action)) {
		throw new ActionError(arg, "Missing action name");
	}

	switch (value.action) {
		case "queue":
		case "play":
			if (isNonEmptyString(value.file)) {
				return {
					action: value.action,
					file: value.file,
					title: optionalString(value.title),
				};
			}
			throw new ActionError(arg, "Missing file");
		case "queue-album":
		case "play-album":
			if (isNonEmptyString(value.album)) {
				return {
					action: value.action,
					album: value.album,
					artist: optionalString(value.artist),
				};
			}
			throw new ActionError(arg, "Missing album");
		case "play-position":
		case "unqueue":
			if (isPosition(value.position)) {
				return { action: value.action, position: value.position };
			}
			throw new ActionError(arg, "Position must be a positive integer");
		case "playpause":
		case "next":
		case "previous":
		case "stop":
		case "clear":
			return { action: value.action };
		case "toggle-output":
			if (isNumber(value.id) && Number.isInteger(value.id)) {
				return {
					action: value.action,
					id: value.id,
					name: optionalString(value.name),
				};
			}
			throw new ActionError(arg, "Output id must be an integer");
		case "load-playlist":
			if (isNonEmptyString(value.name)) {
				return { action: value.action, name: value.name };
			}
			throw new ActionError(arg, "Missing playlist name");
		default:
			throw new ActionError(arg, `Unknown action "${value.action}"`);
	}
}

/**
 * Executes an action.
 * @returns A one-line message for the launcher's notification.
 */
export async function runAction(mpc: Mpc, action: Action): Promise<string> {
	debug("Running action %o", action);

	switch (action.action) {
		case "queue":
			await mpc.queueTrack(action);
			return `Queued "${action.title ?? action.file}"`;
		case "play":
			await mpc.playTrack(action);
			return `Playing "${action.title ?? action.file}"`;
		case "queue-album":
			await mpc.queueAlbum(action.album, action.artist);
			return `Queued album "${action.album}"`;
		case "play-album":
			await mpc.playAlbum(action.album, action.artist);
			return `Playing album "${action.album}"`;
		case "play-position":
			await mpc.play(action.position);
			return `Playing #${action.position}`;
		case "unqueue":
			await mpc.unqueue(action.position);
			return `Removed #${action.position} from the queue`;
		case "playpause":
			return (await mpc.playPause()) === "play" ? "Playing" : "Paused";
		case "next":
			await mpc.next();
			return "Next track";
		case "previous":
			await mpc.previous();
			return "Previous track";
		case "stop":
			await mpc.stop();
			return "Stopped";
		case "clear":
			await mpc.clear();
			return "Cleared the queue";
		case "toggle-output":
			await mpc.toggleOutput(action.id);
			return `Toggled output "${action.name ?? action.id}"`;
		case "load-playlist":
			await mpc.loadPlaylist(action.name);
			return `Loaded playlist "${action.name}"`;
	}
}
