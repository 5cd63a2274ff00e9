import { describe, it, expect } from "vitest";
import { createProgram } from "../src/program.js";

describe("createProgram", () => {
  it("registers the uninstall command", () => {
    const program = createProgram();

    expect(program.name()).toBe("manifest-uninstall");
    expect(program.commands.map((command) => command.name())).toEqual([
      "uninstall",
    ]);
  });

  it("documents the uninstall options in help output", () => {
    const uninstall = createProgram().commands.find(
      (command) => command.name() === "uninstall",
    );

    const help = uninstall?.helpInformation() ?? "";

    expect(help).toContain("--manifest <path>");
    expect(help).toContain("--dest-dir <dir>");
    expect(help).toContain("--strict");
    expect(help).toContain("--dry-run");
  });
});
