import { resolve } from "node:path";
import process from "node:process";

import { loadSettings } from "../configs/settings/loader.js";
import type { BlendshelfSettings } from "../configs/settings/types.js";
import { isDirectory, isFile } from "../utils/fs.js";
import {
  BuildDirectoryNotFoundError,
  FeedNotFoundError,
  LibraryNotFoundError,
} from "./errors.js";

export const LIBRARY_ENV_VARIABLE = "BLENDSHELF_LIBRARY";

export interface CliContext {
  libraryRoot: string;
  settings: BlendshelfSettings;
}

export interface ResolveCliContextOptions {
  library?: string;
  settingsPath?: string;
  /** Fail when the library folder does not exist. */
  requireLibrary?: boolean;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** `--library`, else BLENDSHELF_LIBRARY, else the working directory. */
export function resolveLibraryRoot(
  library: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const configured = library ?? env[LIBRARY_ENV_VARIABLE];
  return configured ? resolve(cwd, configured) : cwd;
}

export async function resolveCliContext(
  options: ResolveCliContextOptions = {},
): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const libraryRoot = resolveLibraryRoot(options.library, options.env, cwd);

  if (options.requireLibrary && !(await isDirectory(libraryRoot))) {
    throw new LibraryNotFoundError(libraryRoot);
  }

  const settings = loadSettings({
    root: libraryRoot,
    filePath: options.settingsPath ? resolve(cwd, options.settingsPath) : undefined,
  });

  return { libraryRoot, settings };
}

export async function ensureBuildDirectory(
  buildPath: string,
  cwd: string = process.cwd(),
): Promise<string> {
  const absolutePath = resolve(cwd, buildPath);
  if (!(await isDirectory(absolutePath))) {
    throw new BuildDirectoryNotFoundError(absolutePath);
  }
  return absolutePath;
}

export async function ensureFeedFile(
  feedPath: string,
  cwd: string = process.cwd(),
): Promise<string> {
  const absolutePath = resolve(cwd, feedPath);
  if (!(await isFile(absolutePath))) {
    throw new FeedNotFoundError(absolutePath);
  }
  return absolutePath;
}
