#!/usr/bin/env node
/**
 * branchd CLI entry point
 */

import { createProgram } from "./cli.js"
import { handleError } from "./utils/handle-error.js"

createProgram()
	.parseAsync()
	.catch((error: unknown) => handleError(error))
