/**
 * PID file management for the snippet daemon.
 *
 * Writes a `server.json` file under the root path containing PID, listen
 * address, version, start time and the snippet directory. The daemon reads
 * it on start to refuse a second instance on the same root.
 */

import { readFile, unlink } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { errnoCode } from "@snipkeep/core/errors";
import { writeAtomic } from "@snipkeep/core/storage";

export const ServerMetadataSchema = z.object({
  pid: z.number().int().positive(),
  host: z.string(),
  port: z.number().int().min(1).max(65535),
  version: z.string(),
  startedAt: z.string(),
  snippetsDir: z.string(),
});

export type ServerMetadata = z.infer<typeof ServerMetadataSchema>;

const PID_FILENAME = "server.json";

/** Resolve the PID file path within the storage root. */
export function pidFilePath(storageRoot: string): string {
  return join(storageRoot, PID_FILENAME);
}

/** Write server metadata to the PID file. */
export async function writePidFile(
  storageRoot: string,
  metadata: ServerMetadata,
): Promise<void> {
  await writeAtomic(
    pidFilePath(storageRoot),
    JSON.stringify(metadata, null, 2) + "\n",
  );
}

/**
 * Read server metadata from the PID file. Returns null if the file doesn't
 * exist or doesn't hold valid metadata.
 */
export async function readPidFile(
  storageRoot: string,
): Promise<ServerMetadata | null> {
  let raw: string;
  try {
    raw = await readFile(pidFilePath(storageRoot), "utf-8");
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = ServerMetadataSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** Remove the PID file. A missing file is not an error. */
export async function removePidFile(storageRoot: string): Promise<void> {
  try {
    await unlink(pidFilePath(storageRoot));
  } catch (err: unknown) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }
}

/** Whether a process with this PID exists. EPERM means it exists under another user. */
export function isProcessAlive(pid: number): boolean {
  try {
    // signal 0 tests if the process exists without actually sending a signal
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return errnoCode(err) === "EPERM";
  }
}

/**
 * Check if the process recorded in the PID file is still running.
 * Returns the metadata if alive, null otherwise.
 * Cleans up stale or unreadable PID files.
 */
export async function checkRunningServer(
  storageRoot: string,
): Promise<ServerMetadata | null> {
  const metadata = await readPidFile(storageRoot);
  if (metadata && isProcessAlive(metadata.pid)) {
    return metadata;
  }

  await removePidFile(storageRoot);
  return null;
}
