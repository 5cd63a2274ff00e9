import { Command } from "commander";
import * as p from "@clack/prompts";
import { resolveSettingsOrExit, type SettingsFlags } from "../config.js";
import {
  ManifestNotFoundError,
  ManifestReadError,
  RemovalFailedError,
} from "../errors.js";
import { ExitSignal, withExitSignal } from "../exit-signal.js";
import { nodeFileRemover, type FileRemover } from "../file-remover.js";
import {
  renderDryRunSummary,
  renderStoppedAt,
  renderUninstallSummary,
} from "../summary.js";
import {
  planUninstall,
  uninstallFromManifest,
  type UninstallResult,
} from "../uninstall.js";

export interface UninstallFlags extends SettingsFlags {
  dryRun?: boolean;
}

function reportFailure(err: unknown): never {
  if (
    err instanceof ManifestNotFoundError ||
    err instanceof ManifestReadError
  ) {
    p.log.error(err.message);
    throw new ExitSignal(1);
  }
  if (err instanceof RemovalFailedError) {
    p.log.error(err.message);
    p.log.warn(renderStoppedAt(err));
    throw new ExitSignal(1);
  }
  throw err;
}

async function runDryRun(manifestPath: string, destDir?: string): Promise<void> {
  let targets: string[];
  try {
    targets = await planUninstall(manifestPath, destDir);
  } catch (err: unknown) {
    reportFailure(err);
  }

  for (const target of targets) {
    p.log.message(target);
  }
  p.outro(renderDryRunSummary(targets));
}

export async function runUninstall(
  flags: UninstallFlags,
  remover: FileRemover = nodeFileRemover,
): Promise<void> {
  const settings = await resolveSettingsOrExit(flags);

  p.intro("manifest-uninstall");

  if (flags.dryRun === true) {
    await runDryRun(settings.manifestPath, settings.destDir);
    return;
  }

  let result: UninstallResult;
  try {
    result = await uninstallFromManifest({
      manifestPath: settings.manifestPath,
      destDir: settings.destDir,
      missing: settings.missing,
      remover,
      onProgress: ({ path }) => p.log.info(`Uninstalling "${path}"`),
    });
  } catch (err: unknown) {
    reportFailure(err);
  }

  p.outro(renderUninstallSummary(result));
}

export const uninstallCommand = new Command("uninstall")
  .description("Remove every file listed in an install manifest")
  .option("-m, --manifest <path>", "Manifest file (default: install_manifest.txt)")
  .option("--dest-dir <dir>", "Prefix for every manifest path (overrides DESTDIR)")
  .option("--strict", "Fail when a listed file is already absent")
  .option("--dry-run", "List the files that would be removed")
  .action(withExitSignal((options: UninstallFlags) => runUninstall(options)));
