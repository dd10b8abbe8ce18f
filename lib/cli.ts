import { Command } from "commander";
import debugCreator from "debug";
import { type AlfredItem, serialize } from "./alfred.js";
import { PACKAGE_NAME } from "./const.js";
import { MpcError } from "./error.js";
import { Mpc } from "./mpc.js";
import { Workflow } from "./workflow.js";

const debug = debugCreator(`${PACKAGE_NAME}:cli`);

export interface CliIO {
	write: (text: string) => void;
	setExitCode: (code: number) => void;
}

const processIO: CliIO = {
	write: (text) => {
		process.stdout.write(`${text}\n`);
	},
	setExitCode: (code) => {
		process.exitCode = code;
	},
};

const joinWords = (words: string[] | undefined): string =>
	(words ?? []).join(" ");

/**
 * Builds the command-line program Alfred calls. Views print Script Filter
 * JSON; `run` prints the notification text for the actioned item.
 * @param workflow - Creates the workflow lazily so `--help` never touches mpc.
 */
export function createProgram(
	workflow: () => Workflow = () => new Workflow(new Mpc()),
	io: CliIO = processIO,
): Command {
	const program = new Command();
	const print = (items: AlfredItem[]) => io.write(serialize(items));

	program
		.name(PACKAGE_NAME)
		.description("Search and control MPD from Alfred")
		.version("0.1.0")
		.option("-v, --verbose", "Enable debug logging on stderr")
		// Program options only before the subcommand; a query like "-M-" is text.
		.enablePositionalOptions()
		.hook("preAction", (thisCommand) => {
			if (thisCommand.opts().verbose) {
				debugCreator.enable(`${PACKAGE_NAME}:*`);
			}
		});

	program
		.command("search", { isDefault: true })
		.description(
			"Search the library; an empty query shows the player status",
		)
		.argument("[query...]", "Free text and field:value filters")
		.allowUnknownOption()
		.passThroughOptions()
		.action(async (query?: string[]) => {
			print(await workflow().search(joinWords(query)));
		});

	program
		.command("queue")
		.description("List the play queue")
		.argument("[filter...]", "Text matched against artist, album and title")
		.allowUnknownOption()
		.passThroughOptions()
		.action(async (filter?: string[]) => {
			print(await workflow().queue(joinWords(filter)));
		});

	program
		.command("outputs")
		.description("List audio outputs")
		.action(async () => {
			print(await workflow().outputs());
		});

	program
		.command("playlists")
		.description("List stored playlists")
		.argument("[filter...]", "Text matched against playlist names")
		.allowUnknownOption()
		.passThroughOptions()
		.action(async (filter?: string[]) => {
			print(await workflow().playlists(joinWords(filter)));
		});

	program
		.command("types")
		.description("List the search types MPD accepts")
		.action(async () => {
			print(await workflow().types());
		});

	program
		.command("run")
		.description("Execute the action key of an actioned item")
		.argument("<action>", "JSON action key")
		.action(async (action: string) => {
			try {
				io.write(await workflow().run(action));
			} catch (error) {
				debug("Action failed: %o", error);
				if (error instanceof MpcError) {
					io.write(error.reason ? `${error.message}: ${error.reason}` : error.message);
				} else {
					io.write(error instanceof Error ? error.message : String(error));
				}
				io.setExitCode(1);
			}
		});

	return program;
}
