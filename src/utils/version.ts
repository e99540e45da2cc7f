import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { z } from "zod";

import { toErrorMessage } from "./errors.js";

const PACKAGE_JSON_FILENAME = "package.json" as const;

const packageVersionSchema = z.object({ version: z.string().trim().min(1) });

let cachedVersion: string | undefined;

export function getBlendshelfVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const packageJsonPath = findPackageJson(__dirname);
  if (packageJsonPath) {
    try {
      const parsed = packageVersionSchema.safeParse(
        JSON.parse(readFileSync(packageJsonPath, "utf-8")),
      );
      if (parsed.success) {
        cachedVersion = parsed.data.version;
        return cachedVersion;
      }
    } catch (error) {
      console.error(
        `[blendshelf] Failed to read ${packageJsonPath}: ${toErrorMessage(error)}`,
      );
    }
  }

  cachedVersion = "unknown";
  return cachedVersion;
}

function findPackageJson(start: string): string | undefined {
  let current = start;

  while (true) {
    const candidate = resolve(current, PACKAGE_JSON_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
