import { readFile } from "node:fs/promises";
import {
  ManifestNotFoundError,
  ManifestReadError,
  isNodeError,
} from "./errors.js";

export const DEFAULT_MANIFEST_FILE = "install_manifest.txt";

export function parseManifest(content: string): string[] {
  const paths: string[] = [];

  for (const line of content.split("\n")) {
    const entry = line.endsWith("\r") ? line.slice(0, -1) : line;
    if (entry.length > 0) {
      paths.push(entry);
    }
  }

  return paths;
}

export async function readManifest(manifestPath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") {
      throw new ManifestNotFoundError(manifestPath);
    }
    throw new ManifestReadError(manifestPath, err);
  }

  return parseManifest(raw);
}
