import { displayLabel, displayVersion } from "../../builds/display.js";
import type { BuildRecord } from "../../builds/types.js";
import { colorize } from "../../utils/colors.js";
import { formatDisplayTimestamp } from "../../utils/timestamps.js";
import { renderTable, type TableColumn } from "../utils/table.js";
import { renderTranscript } from "../utils/transcript.js";

export function formatBuildFlags(record: BuildRecord): string {
  const flags: string[] = [];
  if (record.isFavorite) {
    flags.push(colorize("favorite", "yellow"));
  }
  if (record.isFrozen) {
    flags.push(colorize("frozen", "cyan"));
  }
  return flags.join(",");
}

const BUILD_COLUMNS: readonly TableColumn<BuildRecord>[] = [
  { header: "VERSION", accessor: (record) => displayVersion(record) },
  {
    header: "LABEL",
    accessor: (record) => record.customName || displayLabel(record),
  },
  { header: "BRANCH", accessor: (record) => record.branch },
  { header: "HASH", accessor: (record) => record.buildHash ?? "-" },
  {
    header: "COMMITTED",
    accessor: (record) => formatDisplayTimestamp(record.commitTime),
  },
  { header: "FLAGS", accessor: formatBuildFlags },
];

export function renderBuildTable(records: readonly BuildRecord[]): string[] {
  return renderTable({ columns: BUILD_COLUMNS, rows: records });
}

export interface BuildListTranscriptOptions {
  /** Appended to the build count, e.g. the query that selected them. */
  query?: string;
  source?: string;
  hint?: string;
}

export function renderBuildListTranscript(
  records: readonly BuildRecord[],
  options: BuildListTranscriptOptions = {},
): string {
  return renderTranscript({
    metadata: [
      { label: "Source", value: options.source },
      { label: "Query", value: options.query },
      { label: "Builds", value: String(records.length) },
    ],
    sections: records.length > 0 ? [renderBuildTable(records)] : [],
    hint: options.hint,
  });
}
