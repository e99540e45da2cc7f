import { readFileSync } from "node:fs";
import { join } from "node:path";
import process from "node:process";

import { isMissing } from "../../utils/fs.js";
import { parseYamlDocument } from "../../utils/yaml-reader.js";
import { formatYamlErrorDetail } from "../shared/yaml-error-formatter.js";
import { createDefaultSettings, SETTINGS_FILENAME } from "./defaults.js";
import { SettingsError } from "./errors.js";
import {
  type BlendshelfSettings,
  type SettingsDocument,
  settingsSchema,
  UPDATE_BRANCH_GROUPS,
} from "./types.js";

export interface LoadSettingsOptions {
  /** Library root; settings.yaml is read from here. */
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

/**
 * Reads `<root>/settings.yaml` (or `filePath`). A missing file yields the
 * defaults; any other read error propagates.
 *
 * @throws SettingsError when the file is not valid YAML or holds unknown
 * keys or values.
 */
export function loadSettings(
  options: LoadSettingsOptions = {},
): BlendshelfSettings {
  const root = options.root ?? process.cwd();
  const filePath = options.filePath ?? join(root, SETTINGS_FILENAME);
  const readFile = options.readFile ?? readUtf8;

  let content: string;
  try {
    content = readFile(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return createDefaultSettings();
    }
    throw error;
  }

  return applySettingsDocument(parseSettingsYaml(content, filePath));
}

function readUtf8(path: string): string {
  return readFileSync(path, "utf8");
}

function parseSettingsYaml(content: string, filePath: string): SettingsDocument {
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new SettingsError(filePath, formatYamlErrorDetail(detail)),
    emptyValue: {},
  });

  const result = settingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location =
      issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new SettingsError(
      filePath,
      `${location}${issue?.message ?? "invalid settings value"}`,
    );
  }
  return result.data;
}

function applySettingsDocument(document: SettingsDocument): BlendshelfSettings {
  const settings = createDefaultSettings();
  const { updates, scraping } = document;

  settings.updates.advanced = updates?.advanced ?? settings.updates.advanced;
  settings.updates.behavior = updates?.behavior ?? settings.updates.behavior;
  settings.updates.showButton =
    updates?.showButton ?? settings.updates.showButton;

  for (const group of UPDATE_BRANCH_GROUPS) {
    const override = updates?.branches?.[group];
    const current = settings.updates.branches[group];
    settings.updates.branches[group] = {
      behavior: override?.behavior ?? current.behavior,
      showButton: override?.showButton ?? current.showButton,
    };
  }

  settings.scraping.minimumStableVersion =
    scraping?.minimumStableVersion ?? settings.scraping.minimumStableVersion;
  settings.scraping.ltsVersions =
    scraping?.ltsVersions ?? settings.scraping.ltsVersions;

  return settings;
}
