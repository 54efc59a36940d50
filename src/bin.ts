#!/usr/bin/env node
import { createProgram } from "./cli";
import { describeError } from "./errors";

createProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		console.error(describeError(error));
		process.exitCode = 1;
	});
