import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import archiver from "archiver";
import { ArchiveError, summarizeError } from "../../errors.js";
import { describeError, logger } from "../../logger.js";
import type { ArtifactStore } from "./store.js";

const writeZip = (
  store: ArtifactStore,
  entries: readonly string[],
  destination: string,
): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const output = createWriteStream(destination);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", (warning) => {
      logger.warn("Archiver reported a warning", {
        destination,
        error: describeError(warning),
      });
    });

    archive.pipe(output);
    for (const entry of entries) {
      archive.file(store.artifactPath(entry), { name: entry });
    }
    archive.finalize().catch(reject);
  });

/**
 * Zip every file in the artifact directory into the store's archive path.
 * Entries are stored flat, under their artifact names.
 */
export const packageArtifactDirectory = async (
  store: ArtifactStore,
): Promise<string[]> => {
  const entries = await store.listArtifacts();
  if (entries.length === 0) {
    throw new ArchiveError(`No artifacts to package in ${store.artifactDir}`);
  }

  await store.ensure();
  const destination = store.archivePath;

  try {
    await writeZip(store, entries, destination);
  } catch (error) {
    await rm(destination, { force: true });
    throw new ArchiveError(
      `Failed to write archive ${destination}: ${summarizeError(error)}`,
      { cause: error },
    );
  }

  logger.info("Archive created", {
    archivePath: destination,
    entries: entries.length,
  });
  return entries;
};
