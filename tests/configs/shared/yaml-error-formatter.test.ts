import { describe, expect, test } from "@jest/globals";

import { formatYamlErrorDetail } from "../../../src/configs/shared/yaml-error-formatter.js";

describe("formatYamlErrorDetail", () => {
  test("formats with line and column", () => {
    expect(
      formatYamlErrorDetail({ reason: "unexpected token", line: 5, column: 10 }),
    ).toBe("(line 5, column 10): unexpected token");
  });

  test("formats without location info", () => {
    expect(formatYamlErrorDetail({ reason: "malformed input" })).toBe(
      "malformed input",
    );
  });
});
