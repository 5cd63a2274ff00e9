import { applyDestDir } from "./dest-dir.js";
import { RemovalFailedError } from "./errors.js";
import type { FileRemover } from "./file-remover.js";
import { readManifest } from "./manifest.js";

export type MissingFilePolicy = "ignore" | "fail";

export interface UninstallProgress {
  path: string;
  /** 0-based position in the manifest. */
  index: number;
  total: number;
}

export interface UninstallOptions {
  manifestPath: string;
  destDir?: string;
  remover: FileRemover;
  missing?: MissingFilePolicy;
  onProgress?: (progress: UninstallProgress) => void;
}

export interface UninstallResult {
  removed: string[];
  absent: string[];
  total: number;
}

export async function planUninstall(
  manifestPath: string,
  destDir?: string,
): Promise<string[]> {
  const entries = await readManifest(manifestPath);
  return entries.map((entry) => applyDestDir(destDir, entry));
}

export async function uninstallFromManifest(
  options: UninstallOptions,
): Promise<UninstallResult> {
  const { remover, onProgress } = options;
  const missing = options.missing ?? "ignore";

  const targets = await planUninstall(options.manifestPath, options.destDir);
  const total = targets.length;
  const removed: string[] = [];
  const absent: string[] = [];

  for (const [index, path] of targets.entries()) {
    onProgress?.({ path, index, total });

    const result = await remover.remove(path);

    if (result.status === "removed") {
      removed.push(path);
      continue;
    }

    if (result.status === "absent" && missing === "ignore") {
      absent.push(path);
      continue;
    }

    throw new RemovalFailedError({
      path,
      code: result.status === "failed" ? result.code : "ENOENT",
      position: index + 1,
      total,
      removed,
    });
  }

  return { removed, absent, total };
}
