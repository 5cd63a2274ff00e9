import { rm } from "node:fs/promises";
import { errorMessage, isNodeError } from "./errors.js";

export type RemovalResult =
  | { status: "removed" }
  | { status: "absent" }
  | { status: "failed"; code: string; reason: string };

export interface FileRemover {
  remove(path: string): Promise<RemovalResult>;
}

// Files only: a directory comes back as failed (ERR_FS_EISDIR).
export const nodeFileRemover: FileRemover = {
  async remove(path: string): Promise<RemovalResult> {
    try {
      await rm(path, { recursive: false, force: false });
      return { status: "removed" };
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === "ENOENT") {
        return { status: "absent" };
      }
      const code = isNodeError(err) && err.code ? err.code : "UNKNOWN";
      return { status: "failed", code, reason: errorMessage(err) };
    }
  },
};
