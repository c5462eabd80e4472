/**
 * Object storage on the local file system.
 *
 * Each object is written as `<id>.<ext>` under the configured directory; the
 * returned reference is the file name.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { ObjectStorage } from "@speech-relay/provider-contract";
import { OperatorError, UserError, ErrorCodes } from "@speech-relay/shared-types";

const EXTENSIONS: Record<string, string> = {
  "audio/mpeg": "mp3",
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/ogg": "ogg",
  "audio/opus": "opus",
  "audio/aac": "aac",
  "audio/flac": "flac",
  "audio/pcm": "pcm",
};

/** `obj_<uuid>.<ext>` */
const REF_PATTERN = /^obj_[0-9a-f-]{36}\.[a-z0-9]+$/;

export class FileObjectStorage implements ObjectStorage {
  private ready: Promise<string | undefined> | null = null;

  constructor(private readonly directory: string) {}

  async put(bytes: Uint8Array, contentType: string): Promise<string> {
    const ext = EXTENSIONS[contentType.split(";")[0]?.trim().toLowerCase() ?? ""] ?? "bin";
    const ref = `obj_${randomUUID()}.${ext}`;

    try {
      this.ready ??= mkdir(this.directory, { recursive: true });
      await this.ready;
      await writeFile(join(this.directory, ref), bytes);
    } catch (err) {
      this.ready = null;
      throw new OperatorError(
        ErrorCodes.STORAGE_FAILED,
        "Could not store synthesized audio",
        `${this.directory}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    return ref;
  }

  /** Read an object back by reference. */
  async get(ref: string): Promise<Buffer> {
    if (!REF_PATTERN.test(ref)) {
      throw new UserError(ErrorCodes.INVALID_REQUEST, `Invalid object reference: "${ref}"`);
    }
    return readFile(join(this.directory, ref));
  }
}
