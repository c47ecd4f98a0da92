import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  EmptyUploadError,
  PayloadTooLargeError,
  UnsupportedTypeError,
  allowedExtensionsFor,
  detectContentKind,
  fileExtension,
  isImageContentKind,
  toSafeFilename,
  type ContentKind,
  type UploadKind
} from "@filedesk/core";
import { ulid } from "ulid";

/** The subset of a multer file the validator reads. */
export type UploadedFile = {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
};

export type ScratchFile = {
  path: string;
  originalName: string;
  extension: string;
  kind: ContentKind;
  size: number;
  declaredMime: string;
};

type CheckedUpload = {
  file: UploadedFile;
  extension: string;
  kind: ContentKind;
};

function kindMatches(expected: UploadKind, extension: string, detected: ContentKind): boolean {
  if (detected === "pdf") {
    return expected !== "image" && extension === "pdf";
  }
  if (expected === "pdf" || !isImageContentKind(detected)) {
    return false;
  }
  // Any image container is accepted under any image extension; the decoder reads the bytes.
  return extension !== "pdf";
}

export class UploadValidator {
  constructor(
    private readonly config: {
      scratchDir: string;
      maxUploadBytes: number;
    }
  ) {}

  /**
   * Reject a missing, empty, oversized or mistyped upload without touching disk.
   */
  check(file: UploadedFile | undefined, kind: UploadKind): CheckedUpload {
    if (!file) {
      throw new EmptyUploadError();
    }
    if (!file.originalname || file.originalname.trim().length === 0) {
      throw new EmptyUploadError("No file selected");
    }
    if (file.size === 0 || file.buffer.length === 0) {
      throw new EmptyUploadError("Uploaded file is empty");
    }
    if (file.size > this.config.maxUploadBytes || file.buffer.length > this.config.maxUploadBytes) {
      throw new PayloadTooLargeError(this.config.maxUploadBytes);
    }

    const allowed = allowedExtensionsFor(kind);
    const extension = fileExtension(file.originalname);
    if (!allowed.includes(extension)) {
      throw new UnsupportedTypeError(`Invalid file type. Allowed: ${allowed.join(", ")}`);
    }

    const detected = detectContentKind(file.buffer);
    if (!detected || !kindMatches(kind, extension, detected)) {
      throw new UnsupportedTypeError(`File content does not match a supported ${extension} file`);
    }

    return { file, extension, kind: detected };
  }

  async validateAndPersist(file: UploadedFile | undefined, kind: UploadKind): Promise<ScratchFile> {
    const [persisted] = await this.persist([this.check(file, kind)]);
    if (!persisted) {
      throw new EmptyUploadError();
    }
    return persisted;
  }

  /**
   * Validate every file first, then write them all to scratch. Nothing is left
   * behind when a write fails part way.
   */
  async validateAll(files: UploadedFile[], kind: UploadKind): Promise<ScratchFile[]> {
    if (files.length === 0) {
      throw new EmptyUploadError();
    }
    const checked = files.map((file) => this.check(file, kind));
    return this.persist(checked);
  }

  async discard(files: ScratchFile[]): Promise<void> {
    await Promise.all(files.map((file) => rm(file.path, { force: true })));
  }

  private async persist(checked: CheckedUpload[]): Promise<ScratchFile[]> {
    await mkdir(this.config.scratchDir, { recursive: true });

    const written: ScratchFile[] = [];
    try {
      for (const entry of checked) {
        const scratchPath = path.join(this.config.scratchDir, `${ulid()}.${entry.extension}`);
        await writeFile(scratchPath, entry.file.buffer, { flag: "wx" });
        written.push({
          path: scratchPath,
          originalName: toSafeFilename(entry.file.originalname),
          extension: entry.extension,
          kind: entry.kind,
          size: entry.file.buffer.length,
          declaredMime: entry.file.mimetype
        });
      }
    } catch (error) {
      await this.discard(written);
      throw error;
    }

    return written;
  }
}
