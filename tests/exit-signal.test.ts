import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExitSignal, withExitSignal } from "../src/exit-signal.js";

describe("ExitSignal", () => {
  it("carries its exit code", () => {
    const signal = new ExitSignal(1);

    expect(signal.code).toBe(1);
    expect(signal.message).toBe("exit:1");
    expect(signal.name).toBe("ExitSignal");
  });
});

describe("withExitSignal", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("exits with the signal code when ExitSignal is thrown", async () => {
    const mockExit = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);

    const wrapped = withExitSignal(async () => {
      throw new ExitSignal(1);
    });

    await wrapped();

    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("re-throws other errors", async () => {
    const mockExit = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);

    const wrapped = withExitSignal(async () => {
      throw new Error("unexpected");
    });

    await expect(wrapped()).rejects.toThrow("unexpected");
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("passes arguments through to the wrapped function", async () => {
    const fn = vi.fn(async (_flags: { manifest: string }) => {});
    const wrapped = withExitSignal(fn);

    await wrapped({ manifest: "install_manifest.txt" });

    expect(fn).toHaveBeenCalledWith({ manifest: "install_manifest.txt" });
  });

  it("does not exit when the wrapped function completes", async () => {
    const mockExit = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);

    await withExitSignal(async () => {})();

    expect(mockExit).not.toHaveBeenCalled();
  });
});
