import { access, mkdir, readdir, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { StorageConfig } from "../../config/index.js";
import { logger } from "../../logger.js";

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * On-disk home of one run: the raw screenshots and the archive derived from
 * them. Components receive the store explicitly, so separate runs (tests in
 * particular) can point at separate directories.
 */
export class ArtifactStore {
  readonly artifactDir: string;
  readonly archiveDir: string;
  readonly archiveName: string;

  constructor(config: StorageConfig, rootDir: string = process.cwd()) {
    this.artifactDir = resolve(rootDir, config.artifactDir);
    this.archiveDir = resolve(rootDir, config.archiveDir);
    this.archiveName = config.archiveName;
  }

  get archivePath(): string {
    return join(this.archiveDir, this.archiveName);
  }

  artifactPath(artifactName: string): string {
    return join(this.artifactDir, artifactName);
  }

  async ensure(): Promise<void> {
    await mkdir(this.artifactDir, { recursive: true });
    await mkdir(this.archiveDir, { recursive: true });
  }

  /**
   * Delete both directories and recreate them empty. Nothing from a previous
   * run survives.
   */
  async reset(): Promise<void> {
    await rm(this.artifactDir, { recursive: true, force: true });
    await rm(this.archiveDir, { recursive: true, force: true });
    await this.ensure();
    logger.debug("Artifact store reset", {
      artifactDir: this.artifactDir,
      archiveDir: this.archiveDir,
    });
  }

  async listArtifacts(): Promise<string[]> {
    try {
      const entries = await readdir(this.artifactDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async listArchiveFiles(): Promise<string[]> {
    try {
      return (await readdir(this.archiveDir)).sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }
}
