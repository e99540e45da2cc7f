export interface TableColumn<Row> {
  header: string;
  accessor: (row: Row) => string;
  align?: "left" | "right";
}

interface RenderTableOptions<Row> {
  columns: readonly TableColumn<Row>[];
  rows: readonly Row[];
  columnGap?: string;
}

const ESCAPE_CHARACTER = String.fromCharCode(27);
const ANSI_PATTERN = new RegExp(`${ESCAPE_CHARACTER}\\[[0-9;]*m`, "g");

function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, "").length;
}

function padValue(
  value: string,
  width: number,
  align: "left" | "right" = "left",
): string {
  const length = visibleLength(value);
  if (length >= width) {
    return value;
  }

  const padding = " ".repeat(width - length);
  return align === "right" ? padding + value : value + padding;
}

/**
 * Lays rows out in aligned columns under a header line. Trailing padding of
 * the last column is dropped.
 */
export function renderTable<Row>({
  columns,
  rows,
  columnGap = "  ",
}: RenderTableOptions<Row>): string[] {
  if (columns.length === 0) {
    return [];
  }

  const cells = rows.map((row) => columns.map((column) => column.accessor(row)));
  const widths = columns.map((column, index) =>
    Math.max(
      visibleLength(column.header),
      ...cells.map((values) => visibleLength(values[index] ?? "")),
    ),
  );

  const formatLine = (values: readonly string[]): string =>
    columns
      .map((column, index) =>
        padValue(values[index] ?? "", widths[index] ?? 0, column.align),
      )
      .join(columnGap)
      .trimEnd();

  return [
    formatLine(columns.map((column) => column.header)),
    ...cells.map(formatLine),
  ];
}
