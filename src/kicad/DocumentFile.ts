import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { IOConflictError, NotFoundError } from "./errors";

const BOM = "\uFEFF";

export interface LoadedFile {
  path: string;
  /** File content without a leading byte-order mark. */
  text: string;
  /** Whether the file started with a UTF-8 byte-order mark. */
  bom: boolean;
  /** Content hash at read time, checked again before any write. */
  hash: string;
}

export function contentHash(text: string): string {
  return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}

export function newUuid(): string {
  return crypto.randomUUID();
}

export function stripBom(raw: string): { text: string; bom: boolean } {
  return raw.startsWith(BOM) ? { text: raw.slice(BOM.length), bom: true } : { text: raw, bom: false };
}

export function withBom(text: string, bom: boolean): string {
  return bom ? BOM + text : text;
}

export function readDocumentFile(filePath: string): LoadedFile {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError("file", filePath, { operation: "read" });
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  return { path: filePath, ...stripBom(raw), hash: contentHash(raw) };
}

/** Library and table files are only read; a byte-order mark is dropped. */
export function readLibraryText(filePath: string): string {
  return stripBom(fs.readFileSync(filePath, "utf-8")).text;
}

/**
 * Write through a temporary file in the target directory, then rename it
 * over the target. With `expectedHash`, the target must still hold the
 * content that was read; otherwise nothing is written.
 */
export function writeAtomic(filePath: string, content: string, expectedHash?: string): string {
  if (expectedHash !== undefined) {
    const current = fs.existsSync(filePath) ? contentHash(fs.readFileSync(filePath, "utf-8")) : undefined;
    if (current !== expectedHash) {
      throw new IOConflictError(filePath, { operation: "write" });
    }
  }

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`);
  fs.writeFileSync(tmpPath, content, "utf-8");
  try {
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
  return contentHash(content);
}
