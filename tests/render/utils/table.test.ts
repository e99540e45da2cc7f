import { describe, expect, it } from "@jest/globals";

import { renderTable } from "../../../src/render/utils/table.js";

interface Row {
  name: string;
  count: number;
}

describe("renderTable", () => {
  it("aligns columns and drops trailing padding", () => {
    const lines = renderTable<Row>({
      columns: [
        { header: "NAME", accessor: (row) => row.name },
        { header: "N", accessor: (row) => String(row.count), align: "right" },
      ],
      rows: [
        { name: "a", count: 10 },
        { name: "long", count: 2 },
      ],
    });

    expect(lines).toEqual(["NAME   N", "a     10", "long   2"]);
  });

  it("ignores color codes when measuring", () => {
    const lines = renderTable<string>({
      columns: [
        { header: "FLAG", accessor: (row) => row },
        { header: "X", accessor: () => "x" },
      ],
      rows: ["\u001B[33mok\u001B[39m"],
    });

    expect(lines).toEqual(["FLAG  X", "\u001B[33mok\u001B[39m    x"]);
  });

  it("renders nothing without columns", () => {
    expect(renderTable<number>({ columns: [], rows: [1, 2] })).toEqual([]);
  });
});
