import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("format utilities", () => {
  describe("formatBytes", () => {
    test("formats bytes without decimals", () => {
      expect(formatBytes(512)).toBe("512 B");
    });

    test("scales to larger units", () => {
      expect(formatBytes(1024)).toBe("1.00 KB");
      expect(formatBytes(1536)).toBe("1.50 KB");
      expect(formatBytes(5 * 1024 * 1024 * 1024)).toBe("5.00 GB");
    });

    test("treats zero, negative and non-finite values as zero", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(-10)).toBe("0 B");
      expect(formatBytes(Number.NaN)).toBe("0 B");
    });
  });

  describe("formatDuration", () => {
    test("formats short durations", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(1500)).toBe("1.5s");
    });

    test("formats minutes and hours", () => {
      expect(formatDuration(125_000)).toBe("2m 5s");
      expect(formatDuration(3_725_000)).toBe("1h 2m");
    });
  });
});
