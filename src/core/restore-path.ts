import { join } from "node:path";
import { ensureDir } from "../utils/fs.js";
import { validationError } from "./errors.js";
import type { SnapshotDescriptor } from "./restic.js";

interface WallClock {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})/;

const pad = (n: number) => String(n).padStart(2, "0");

function wallClock(time: string | Date): WallClock {
  if (typeof time === "string") {
    // restic writes local time with an offset; keep the fields as written
    const m = ISO_PREFIX.exec(time.trim());
    if (m) {
      const [, year, month, day, hour, minute, second] = m;
      return { year, month, day, hour, minute, second };
    }
  }

  const date = typeof time === "string" ? new Date(time) : time;
  if (Number.isNaN(date.getTime())) {
    throw validationError(`Invalid snapshot time: ${String(time)}`);
  }
  return {
    year: String(date.getUTCFullYear()),
    month: pad(date.getUTCMonth() + 1),
    day: pad(date.getUTCDate()),
    hour: pad(date.getUTCHours()),
    minute: pad(date.getUTCMinutes()),
    second: pad(date.getUTCSeconds()),
  };
}

/** `YYYY-MM-DD-HHMMSS` */
export function formatSnapshotTimestamp(time: string | Date): string {
  const c = wallClock(time);
  return `${c.year}-${c.month}-${c.day}-${c.hour}${c.minute}${c.second}`;
}

/**
 * Turn an absolute source path from any OS into a relative one:
 * `C:\Users\me` -> `Users/me`, `/home/me` -> `home/me`.
 */
export function normalizeOriginalPath(originalPath: string): string {
  return originalPath
    .replace(/\\/g, "/")
    .replace(/^[A-Za-z]:/, "")
    .replace(/^\//, "");
}

/**
 * `{baseDir}/{YYYY-MM-DD-HHMMSS}`, created if missing.
 */
export async function buildBaseRestorePath(baseDir: string, time: string | Date): Promise<string> {
  const dir = join(baseDir, formatSnapshotTimestamp(time));
  await ensureDir(dir);
  return dir;
}

/**
 * Timestamped directory plus the original source path beneath it, created
 * if missing. Without `originalPath` this is {@link buildBaseRestorePath}.
 */
export async function buildFullRestorePath(
  baseDir: string,
  time: string | Date,
  originalPath?: string,
): Promise<string> {
  const base = await buildBaseRestorePath(baseDir, time);
  const relative = originalPath ? normalizeOriginalPath(originalPath) : "";
  if (!relative) return base;

  const full = join(base, relative);
  await ensureDir(full);
  return full;
}

/**
 * Summary lines shown before a restore starts.
 */
export function formatRestoreInfo(
  snapshot: Pick<SnapshotDescriptor, "shortId" | "time" | "hostname" | "paths">,
  restorePath: string,
  originalPath?: string,
): Record<string, string> {
  const c = wallClock(snapshot.time);
  const info: Record<string, string> = {
    Snapshot: snapshot.shortId || "N/A",
    Date: `${c.year}-${c.month}-${c.day} ${c.hour}:${c.minute}:${c.second}`,
    Hostname: snapshot.hostname || "N/A",
    "Restore target": restorePath,
  };
  if (originalPath) info["Original path"] = originalPath;
  if (snapshot.paths.length > 0) info["Backup paths"] = snapshot.paths.join(", ");
  return info;
}
