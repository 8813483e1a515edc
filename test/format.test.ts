import { describe, it, expect } from "vitest";
import { formatBytes, formatDuration, formatTimeAgo } from "../src/utils/format.js";

describe("formatBytes", () => {
  it("formats 0 bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
  });

  it("keeps small counts in bytes", () => {
    expect(formatBytes(512)).toBe("512 B");
  });

  it("formats kibibytes", () => {
    expect(formatBytes(1536)).toBe("1.5 KiB");
  });

  it("drops decimals from ten units up", () => {
    expect(formatBytes(1024 * 1024 * 156)).toBe("156 MiB");
  });

  it("caps at the largest unit", () => {
    expect(formatBytes(1024 ** 5 * 2)).toBe("2048 TiB");
  });

  it("treats negative and non-finite values as zero", () => {
    expect(formatBytes(-5)).toBe("0 B");
    expect(formatBytes(Number.NaN)).toBe("0 B");
  });
});

describe("formatDuration", () => {
  it("formats milliseconds", () => {
    expect(formatDuration(0.25)).toBe("250ms");
  });

  it("formats seconds", () => {
    expect(formatDuration(12.34)).toBe("12.3s");
  });

  it("formats minutes", () => {
    expect(formatDuration(185)).toBe("3m 5s");
  });

  it("formats hours", () => {
    expect(formatDuration(2 * 3600 + 120)).toBe("2h 2m");
  });
});

describe("formatTimeAgo", () => {
  const now = new Date("2025-08-19T12:00:00Z");
  const ago = (ms: number) => new Date(now.getTime() - ms);

  it("says just now under a minute", () => {
    expect(formatTimeAgo(ago(30_000), now)).toBe("just now");
  });

  it("uses the singular for one unit", () => {
    expect(formatTimeAgo(ago(60_000), now)).toBe("1 minute ago");
  });

  it("formats hours", () => {
    expect(formatTimeAgo(ago(5 * 3_600_000), now)).toBe("5 hours ago");
  });

  it("formats days", () => {
    expect(formatTimeAgo(ago(2 * 86_400_000), now)).toBe("2 days ago");
  });

  it("falls back to the date after 30 days", () => {
    expect(formatTimeAgo(new Date("2025-06-01T08:00:00Z"), now)).toBe("2025-06-01");
  });
});
