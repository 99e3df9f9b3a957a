import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { serializeStoredToken } from "./credential-files.js";
import type { AuthorizedUserCredential } from "./types.js";

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read a file as UTF-8, or `undefined` when it does not exist.
 */
export async function readOptionalFile(
  filePath: string,
): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) return undefined;
    throw err;
  }
}

/**
 * Persist a user credential. The document is written to a sibling temp file
 * and renamed over the target, so readers see either the old or the new token.
 */
export async function writeTokenFile(
  filePath: string,
  credential: AuthorizedUserCredential,
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    await fs.writeFile(tempPath, serializeStoredToken(credential), {
      encoding: "utf8",
      mode: 0o600,
    });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Remove the token file. Returns false when there was nothing to remove.
 */
export async function deleteTokenFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
}
