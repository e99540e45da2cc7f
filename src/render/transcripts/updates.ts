import { displayLabel, displayVersion } from "../../builds/display.js";
import type { BuildRecord } from "../../builds/types.js";
import { colorize } from "../../utils/colors.js";
import { formatDisplayTimestamp } from "../../utils/timestamps.js";
import { renderTable } from "../utils/table.js";
import { renderTranscript } from "../utils/transcript.js";

export type UpdateOffer =
  | {
      installed: BuildRecord;
      status: "update";
      update: BuildRecord;
      /** Moving to `update` changes the major or minor release. */
      majorChange: boolean;
    }
  | { installed: BuildRecord; status: "current" | "frozen" | "unmanaged" | "hidden" };

function describeInstalled(record: BuildRecord): string {
  return `${displayVersion(record)} ${record.customName || displayLabel(record)}`;
}

function describeOffer(offer: UpdateOffer): string {
  switch (offer.status) {
    case "frozen":
      return colorize("frozen", "cyan");
    case "unmanaged":
      return colorize("no update policy", "gray");
    case "hidden":
      return colorize("updates hidden", "gray");
    case "current":
      return "up to date";
    case "update": {
      const target = `${displayVersion(offer.update)} (${offer.update.buildHash ?? "no hash"}, ${formatDisplayTimestamp(offer.update.commitTime)})`;
      return offer.majorChange
        ? `${colorize(target, "green")} ${colorize("major change", "yellow")}`
        : colorize(target, "green");
    }
  }
}

export function renderUpdatesTranscript(offers: readonly UpdateOffer[]): string {
  if (offers.length === 0) {
    return renderTranscript({
      sections: [["No installed builds."]],
    });
  }

  const table = renderTable({
    columns: [
      { header: "INSTALLED", accessor: (offer: UpdateOffer) => describeInstalled(offer.installed) },
      { header: "BRANCH", accessor: (offer: UpdateOffer) => offer.installed.branch },
      { header: "UPDATE", accessor: describeOffer },
    ],
    rows: offers,
  });

  const available = offers.filter((offer) => offer.status === "update").length;
  return renderTranscript({
    metadata: [{ label: "Updates available", value: String(available) }],
    sections: [table],
    hint:
      available > 0
        ? "Builds marked as a major change move to another major or minor release."
        : undefined,
  });
}
