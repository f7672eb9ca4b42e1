import type { Command } from "commander"
import { CLI_NAME } from "../constants.js"
import type { VersionProvider } from "../self-update/types.js"

export function registerVersionCommand(program: Command, versionProvider: VersionProvider): void {
	program
		.command("version")
		.description("Print the version number")
		.action(() => {
			console.log(`${CLI_NAME} version ${versionProvider.version}`)
		})
}
