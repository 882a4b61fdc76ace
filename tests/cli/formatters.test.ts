import { describe, expect, test } from "vitest";
import { parseCount } from "../../src/cli/context";
import {
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  truncate,
} from "../../src/cli/ui/formatters";
import { ValidationError } from "../../src/errors";

const plain = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, "");

describe("formatters", () => {
  test("truncate keeps short values and marks cut ones", () => {
    expect(truncate("docs", 10)).toBe("docs");
    expect(truncate("documents", 5)).toBe("docu…");
    expect(truncate("documents", 0)).toBe("documents");
  });

  test("formatTimestamp drops the fraction and the T", () => {
    expect(formatTimestamp("2025-01-31T02:00:00.000Z")).toBe("2025-01-31 02:00:00");
    expect(formatTimestamp(null)).toBe("-");
  });

  test("formatSummary aligns labels and skips empty values", () => {
    const text = formatSummary([
      { label: "Name", value: "docs" },
      { label: "Last sync", value: null },
      { label: "Archives", value: 3 },
    ]);

    expect(plain(text)).toBe("Name       docs\nArchives   3");
  });

  test("formatTableRow pads and truncates each column", () => {
    const row = formatTableRow(["docs", "/backups/documents"], [6, 8]);

    expect(plain(row)).toBe("docs   │ /backup…");
  });

  test("formatTableSeparator joins the column rules", () => {
    expect(plain(formatTableSeparator([2, 3]))).toBe("───┼────");
  });
});

describe("parseCount", () => {
  test("accepts non-negative integers", () => {
    expect(parseCount("0", "--strip-components")).toBe(0);
    expect(parseCount("3", "--strip-components")).toBe(3);
    expect(parseCount(undefined, "--strip-components")).toBeUndefined();
  });

  test("rejects anything else", () => {
    expect(() => parseCount("-1", "--strip-components")).toThrow(ValidationError);
    expect(() => parseCount("1.5", "--strip-components")).toThrow(
      "--strip-components must be a non-negative integer",
    );
  });
});
