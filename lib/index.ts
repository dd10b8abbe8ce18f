import { decodeAction, encodeAction, runAction } from "./actions.js";
import { errorItem, infoItem, serialize } from "./alfred.js";
import { createProgram } from "./cli.js";
import { Command } from "./command.js";
import { applyDefaultValuesIfNotSet } from "./config.js";
import {
	ActionError,
	CommandFailedError,
	ConnectionError,
	ExecutableNotFoundError,
	InvalidTypeError,
	MpcError,
} from "./error.js";
import { Mpc } from "./mpc.js";
import { formatQuery, parseQuery, toMpcArgs, tokenize } from "./query.js";
import { spawnProcess } from "./runner.js";
import { Workflow, trackItem } from "./workflow.js";

export type { Action, ActionName } from "./actions.js";
export type { AlfredItem, ScriptFilterResponse } from "./alfred.js";
export type { Config, ResolvedConfig } from "./config.js";
export type { ProcessRunner, RunOptions } from "./runner.js";
export type {
	FieldFilter,
	Output,
	PlayerState,
	ProcessResult,
	SearchType,
	Stats,
	Status,
	Track,
} from "./types.js";

export default Mpc;
export {
	decodeAction,
	encodeAction,
	runAction,
	errorItem,
	infoItem,
	serialize,
	createProgram,
	Command,
	applyDefaultValuesIfNotSet,
	ActionError,
	CommandFailedError,
	ConnectionError,
	ExecutableNotFoundError,
	InvalidTypeError,
	MpcError,
	Mpc,
	formatQuery,
	parseQuery,
	toMpcArgs,
	tokenize,
	spawnProcess,
	Workflow,
	trackItem,
};
