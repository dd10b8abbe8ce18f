import { describe, expect, it, vi } from "vitest";
import { type CliIO, createProgram } from "../lib/cli.js";
import { Mpc } from "../lib/mpc.js";
import { Workflow } from "../lib/workflow.js";
import {
	TEST_CONFIG,
	fakeRunner,
	receivedCommands,
	trackLine,
} from "./helpers/fakeRunner.js";

const WARSZAWA = {
	artist: "David Bowie",
	album: "Low",
	disc: "1",
	track: "8",
	title: "Warszawa",
	file: "Bowie/Low/08 Warszawa.flac",
};

const setup = (replies: Parameters<typeof fakeRunner>[0] = {}) => {
	const runner = fakeRunner(replies);
	const output: string[] = [];
	const io: CliIO = {
		write: (text) => {
			output.push(text);
		},
		setExitCode: vi.fn(),
	};
	const program = createProgram(
		() => new Workflow(new Mpc(TEST_CONFIG, runner)),
		io,
	);
	const parse = (...args: string[]) => program.parseAsync(args, { from: "user" });
	return { runner, output, io, parse };
};

describe("createProgram", () => {
	it("should print search results as Script Filter JSON", async () => {
		const { runner, output, parse } = setup({
			search: { stdout: `${trackLine(WARSZAWA)}\n` },
		});

		await parse("search", 'artist:"David Bowie"');

		expect(receivedCommands(runner)).toEqual([
			["search", "artist", "David Bowie"],
		]);
		expect(output).toHaveLength(1);
		const response: unknown = JSON.parse(output[0]);
		expect(response).toMatchObject({
			items: [{ uid: WARSZAWA.file, title: "Warszawa" }],
		});
	});

	it("should search when no command is given", async () => {
		const { runner, parse } = setup();

		await parse("warszawa");

		expect(receivedCommands(runner)).toEqual([["search", "any", "warszawa"]]);
	});

	it("should search for text that starts with a dash", async () => {
		const { runner, output, parse } = setup();

		await parse("search", "-M-");

		expect(receivedCommands(runner)).toEqual([["search", "any", "-M-"]]);
		expect(output).toHaveLength(1);
	});

	it("should keep dashes after the first word in the query", async () => {
		const { runner, parse } = setup();

		await parse("search", "artist:-M-", "--live");

		expect(receivedCommands(runner)).toEqual([
			["search", "artist", "-M-", "any", "--live"],
		]);
	});

	it("should treat everything after -- as the query", async () => {
		const { runner, parse } = setup();

		await parse("search", "--", "-v");

		expect(receivedCommands(runner)).toEqual([["search", "any", "-v"]]);
	});

	it("should filter the queue by dash-led text", async () => {
		const { output, parse } = setup({
			playlist: { stdout: `${trackLine(WARSZAWA)}\n` },
		});

		await parse("queue", "-low");

		const response: unknown = JSON.parse(output[0]);
		expect(response).toMatchObject({
			items: [{ title: "No matching tracks", subtitle: "-low" }],
		});
	});

	it("should print the queue", async () => {
		const { output, parse } = setup();

		await parse("queue");

		expect(output).toEqual([
			'{"items":[{"title":"Queue is empty","valid":false,"icon":{"path":"/System/Library/CoreServices/CoreTypes.bundle/Contents/Resources/AlertCautionIcon.icns"}}]}',
		]);
	});

	it("should pass the playlist filter through", async () => {
		const { output, parse } = setup({
			lsplaylists: { stdout: "Favourites\nRoad trip\n" },
		});

		await parse("playlists", "fav");

		const response: unknown = JSON.parse(output[0]);
		expect(response).toEqual({
			items: [
				{
					uid: "playlist-Favourites",
					title: "Favourites",
					subtitle: "Load playlist",
					arg: '{"action":"load-playlist","name":"Favourites"}',
				},
			],
		});
	});

	it("should print the message of a successful action", async () => {
		const { runner, output, io, parse } = setup();

		await parse("run", '{"action":"stop"}');

		expect(receivedCommands(runner)).toEqual([["stop"]]);
		expect(output).toEqual(["Stopped"]);
		expect(io.setExitCode).not.toHaveBeenCalled();
	});

	it("should report a failed action and set the exit code", async () => {
		const { output, io, parse } = setup({
			next: { exitCode: 1, stderr: "MPD error: Connection refused\n" },
		});

		await parse("run", '{"action":"next"}');

		expect(output).toEqual([
			"Can't connect to MPD: Are your host & port settings correct? Is MPD running?",
		]);
		expect(io.setExitCode).toHaveBeenCalledWith(1);
	});

	it("should report a malformed action key", async () => {
		const { runner, output, io, parse } = setup();

		await parse("run", '{"action":"shuffle"}');

		expect(runner).not.toHaveBeenCalled();
		expect(output).toEqual([
			'Invalid action: {"action":"shuffle"}: Unknown action "shuffle"',
		]);
		expect(io.setExitCode).toHaveBeenCalledWith(1);
	});
});
