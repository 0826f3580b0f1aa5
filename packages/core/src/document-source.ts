import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, isAbsolute, join, relative, resolve } from "node:path";
import type { DocumentSource } from "@groundwork/types";
import { ExtractionError, ValidationError } from "@groundwork/errors";

export type SourceReader = (source: DocumentSource) => Promise<Uint8Array | string>;

/** Raw bytes of a stored upload, or the inline text as given. */
export const readDocumentSource: SourceReader = async (source) => {
  if (source.type === "inline") {
    return source.content;
  }
  try {
    return await readFile(source.path);
  } catch (err: unknown) {
    throw new ExtractionError(`Cannot read ${source.path}`, { cause: err });
  }
};

/**
 * Absolute path of an upload named relative to `uploadDir`. Paths that leave
 * the directory are refused.
 */
export function resolveUploadPath(uploadDir: string, path: string): string {
  const root = resolve(uploadDir);
  const resolved = resolve(root, path);
  const inside = relative(root, resolved);

  if (inside === "" || inside.startsWith("..") || isAbsolute(inside)) {
    throw new ValidationError("Invalid request", {
      path: "path must name a file inside the upload directory",
    });
  }
  return resolved;
}

function safeSegment(name: string): string {
  return /^\.*$/.test(name) ? "upload" : name;
}

/** Write uploaded bytes to `<uploadDir>/<documentId>/<filename>`. */
export async function storeUpload(
  uploadDir: string,
  documentId: string,
  filename: string,
  bytes: Uint8Array,
): Promise<string> {
  const dir = resolveUploadPath(uploadDir, safeSegment(encodeURIComponent(documentId)));
  await mkdir(dir, { recursive: true });
  const path = join(dir, safeSegment(basename(filename)));
  await writeFile(path, bytes);
  return path;
}
