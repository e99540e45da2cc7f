export interface TranscriptMetadataEntry {
  label: string;
  value?: string | null;
}

export interface TranscriptOptions {
  metadata?: TranscriptMetadataEntry[];
  sections?: string[][];
  hint?: string;
}

/**
 * Joins metadata lines, blank-line separated sections and a closing hint.
 * Empty sections and metadata without a value are skipped.
 */
export function renderTranscript({
  metadata = [],
  sections = [],
  hint,
}: TranscriptOptions): string {
  const blocks: string[][] = [];

  const metadataLines = metadata
    .filter((entry): entry is TranscriptMetadataEntry & { value: string } => {
      return typeof entry.value === "string" && entry.value.length > 0;
    })
    .map((entry) => `${entry.label}: ${entry.value}`);

  if (metadataLines.length > 0) {
    blocks.push(metadataLines);
  }
  blocks.push(...sections.filter((block) => block.length > 0));
  if (hint) {
    blocks.push([hint]);
  }

  const lines = blocks.flatMap((block, index) =>
    index < blocks.length - 1 ? [...block, ""] : block,
  );
  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
