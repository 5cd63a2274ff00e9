import { describe, it, expect } from "vitest";
import {
  renderDryRunSummary,
  renderStoppedAt,
  renderUninstallSummary,
} from "../src/summary.js";

describe("renderUninstallSummary", () => {
  it("counts removed files", () => {
    expect(
      renderUninstallSummary({ removed: ["/a", "/b", "/c"], absent: [], total: 3 }),
    ).toBe("Uninstalled 3 files");
  });

  it("uses the singular for one file", () => {
    expect(
      renderUninstallSummary({ removed: ["/a"], absent: [], total: 1 }),
    ).toBe("Uninstalled 1 file");
  });

  it("mentions files that were already absent", () => {
    expect(
      renderUninstallSummary({ removed: ["/a"], absent: ["/b", "/c"], total: 3 }),
    ).toBe("Uninstalled 1 file, 2 already absent");
  });

  it("handles an empty manifest", () => {
    expect(renderUninstallSummary({ removed: [], absent: [], total: 0 })).toBe(
      "Uninstalled 0 files",
    );
  });
});

describe("renderDryRunSummary", () => {
  it("counts the targets", () => {
    expect(renderDryRunSummary(["/a", "/b"])).toBe("Would uninstall 2 files");
  });

  it("uses the singular for one target", () => {
    expect(renderDryRunSummary(["/a"])).toBe("Would uninstall 1 file");
  });
});

describe("renderStoppedAt", () => {
  it("names the position and total", () => {
    expect(renderStoppedAt({ position: 3, total: 4 })).toBe(
      "Stopped at file 3 of 4",
    );
  });
});
