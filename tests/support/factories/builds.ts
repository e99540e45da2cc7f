import { createBuildRecord } from "../../../src/builds/record.js";
import type { BuildRecord, BuildRecordInput } from "../../../src/builds/types.js";

export function makeBuild(overrides: Partial<BuildRecordInput> = {}): BuildRecord {
  return createBuildRecord({
    link: "https://builds.example.test/blender.zip",
    subversion: "4.2.0",
    branch: "stable",
    buildHash: null,
    commitTime: new Date("2024-07-16T10:00:00Z"),
    ...overrides,
  });
}

export function utc(text: string): Date {
  return new Date(text);
}
