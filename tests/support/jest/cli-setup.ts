import { afterEach, beforeEach, jest } from "@jest/globals";

let originalExitCode: typeof process.exitCode;

beforeEach(() => {
  originalExitCode = process.exitCode;
});

afterEach(() => {
  jest.restoreAllMocks();
  process.exitCode = originalExitCode ?? undefined;
});
