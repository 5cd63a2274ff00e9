import { Command } from "commander";
import { uninstallCommand } from "./commands/uninstall.js";

export function createProgram(): Command {
	const program = new Command();

	program
		.name("manifest-uninstall")
		.description("Remove the files a previous install listed in its manifest")
		.version("0.1.0");

	program.addCommand(uninstallCommand);

	program.showHelpAfterError(true);

	program.action(() => {
		program.outputHelp();
	});

	return program;
}
