import { readFileSync } from "node:fs";
import { join } from "node:path";

import {
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import { toCliError } from "../../src/cli/errors.js";
import { renderCliError } from "../../src/render/utils/errors.js";
import { InvalidVersionFormatError } from "../../src/versions/errors.js";

describe("CLI entrypoint", () => {
  let stdout: string[];
  let stderr: string[];
  let stdoutSpy: jest.SpiedFunction<typeof process.stdout.write> | undefined;
  let stderrSpy: jest.SpiedFunction<typeof process.stderr.write> | undefined;
  let runCli!: (argv?: readonly string[]) => Promise<void>;

  beforeAll(async () => {
    ({ runCli } = await import("../../src/bin.js"));
  });

  beforeEach(() => {
    stdout = [];
    stderr = [];
    stdoutSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation((chunk: unknown) => {
        stdout.push(String(chunk));
        return true;
      });
    stderrSpy = jest
      .spyOn(process.stderr, "write")
      .mockImplementation((chunk: unknown) => {
        stderr.push(String(chunk));
        return true;
      });
  });

  afterEach(() => {
    stdoutSpy?.mockRestore();
    stderrSpy?.mockRestore();
  });

  it("prints a normalized version", async () => {
    await runCli(["node", "blendshelf", "version", "2.80 (sub 75)"]);

    expect(stdout.join("")).toBe(
      "\nInput: 2.80 (sub 75)\nVersion: 2.80.75\nRelease: 2.80.75\nDisplay: 2.80\n\n",
    );
    expect(stderr).toHaveLength(0);
  });

  it("renders unparsable versions with a hint", async () => {
    await runCli(["node", "blendshelf", "version", "banana"]);

    expect(stdout.join("")).toBe(
      `\n${renderCliError(toCliError(new InvalidVersionFormatError("banana")))}\n\n`,
    );
    expect(stdout.join("")).toContain(
      "Expected something like 4.2.0, 4.3.0-alpha, 2.79rc1 or 2.80 (sub 75).",
    );
    expect(process.exitCode).toBe(1);
  });

  it("does not duplicate Commander usage errors", async () => {
    await runCli(["node", "blendshelf", "install"]);

    const occurrences =
      stderr.join("").match(/error: unknown command 'install'/gu) ?? [];
    expect(stdout).toHaveLength(0);
    expect(occurrences).toHaveLength(1);
    expect(process.exitCode).toBe(1);
  });

  it("prints the CLI version for -v/--version", async () => {
    await runCli(["node", "blendshelf", "--version"]);

    const packageJsonRaw = readFileSync(
      join(__dirname, "../../package.json"),
      "utf-8",
    );
    const { version } = JSON.parse(packageJsonRaw) as { version: string };

    expect(stdout.join("").trim()).toBe(version);
    expect(stderr.join("")).toHaveLength(0);
    expect(process.exitCode).toBe(0);
  });
});
