import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { ulid } from "ulid";
import { hasErrorCode, sweepStaleFiles } from "../lib/sweep";

export const ARTIFACT_ID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}\.[a-z0-9]{1,8}$/;
const EXTENSION_PATTERN = /^[a-z0-9]{1,8}$/;

export type ArtifactInfo = {
  artifactId: string;
  path: string;
  size: number;
  extension: string;
  createdAt: Date;
  modifiedAt: Date;
};

export interface OutputStore {
  put(bytes: Uint8Array, extension: string): Promise<string>;
  urlFor(artifactId: string): string;
  resolvePath(artifactId: string): string | null;
  describe(artifactId: string): Promise<ArtifactInfo | null>;
  sweepExpired(now: Date): Promise<string[]>;
}

export function isArtifactId(value: string): boolean {
  return ARTIFACT_ID_PATTERN.test(value);
}

/**
 * Output directory of immutable artifacts named `<ulid>.<ext>`.
 */
export class FileSystemOutputStore implements OutputStore {
  private ready: Promise<string | undefined> | null = null;

  constructor(
    private readonly config: {
      outputDir: string;
      urlPrefix: string;
      ttlMinutes: number;
      now?: () => Date;
    }
  ) {}

  private ensureDir(): Promise<string | undefined> {
    if (!this.ready) {
      this.ready = mkdir(this.config.outputDir, { recursive: true }).catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  async put(bytes: Uint8Array, extension: string): Promise<string> {
    const normalized = extension.replace(/^\./, "").toLowerCase();
    if (!EXTENSION_PATTERN.test(normalized)) {
      throw new Error(`Invalid artifact extension: ${extension}`);
    }

    await this.ensureDir();
    const now = this.config.now ? this.config.now() : new Date();
    const artifactId = `${ulid(now.getTime())}.${normalized}`;
    // "wx" refuses to replace an existing artifact.
    await writeFile(path.join(this.config.outputDir, artifactId), bytes, { flag: "wx" });
    return artifactId;
  }

  urlFor(artifactId: string): string {
    return `${this.config.urlPrefix}/${encodeURIComponent(artifactId)}`;
  }

  resolvePath(artifactId: string): string | null {
    if (!isArtifactId(artifactId)) {
      return null;
    }
    return path.join(this.config.outputDir, artifactId);
  }

  async describe(artifactId: string): Promise<ArtifactInfo | null> {
    const filePath = this.resolvePath(artifactId);
    if (!filePath) {
      return null;
    }

    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        return null;
      }
      return {
        artifactId,
        path: filePath,
        size: stats.size,
        extension: path.extname(artifactId).slice(1),
        createdAt: stats.birthtime,
        modifiedAt: stats.mtime
      };
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
  }

  async sweepExpired(now: Date): Promise<string[]> {
    return sweepStaleFiles({
      directory: this.config.outputDir,
      maxAgeMs: this.config.ttlMinutes * 60 * 1000,
      now,
      matches: isArtifactId
    });
  }
}
