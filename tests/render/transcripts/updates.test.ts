import { describe, expect, it } from "@jest/globals";

import { renderUpdatesTranscript } from "../../../src/render/transcripts/updates.js";
import { makeBuild, utc } from "../../support/factories/builds.js";

describe("renderUpdatesTranscript", () => {
  it("says so when nothing is installed", () => {
    expect(renderUpdatesTranscript([])).toBe("No installed builds.");
  });

  it("lists the offer for each installed build", () => {
    const installed = makeBuild({ subversion: "4.2.1", buildHash: "inst01" });
    const update = makeBuild({
      subversion: "4.2.3",
      buildHash: "c1",
      commitTime: utc("2024-10-01T00:00:00Z"),
    });
    const frozen = makeBuild({ subversion: "3.6.0", isFrozen: true });

    const output = renderUpdatesTranscript([
      { installed, status: "update", update, majorChange: false },
      { installed: frozen, status: "frozen" },
    ]);

    expect(output.split("\n")).toEqual([
      "Updates available: 1",
      "",
      "INSTALLED     BRANCH  UPDATE",
      "4.2.1 Stable  stable  \u001B[32m4.2.3 (c1, 2024-10-01 00:00 UTC)\u001B[39m",
      "3.6.0 Stable  stable  \u001B[36mfrozen\u001B[39m",
      "",
      "Builds marked as a major change move to another major or minor release.",
    ]);
  });
});
