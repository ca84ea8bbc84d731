import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { createDocumentInfo } from "../document-info";
import { resolveDocumentType } from "../document-types";
import type { DocumentInfo, DocumentSource, DocumentType } from "../types";

export interface FileSystemSourceOptions {
  /** Directory to walk. */
  root: string;
  /** Extensions (no leading dot) to enumerate. */
  allowedExt: readonly string[];
  /** Folder names (not globs) pruned at any depth. */
  excludedFolders?: readonly string[];
  /** Capabilities used to resolve each file's document type. */
  documentTypes: readonly DocumentType[];
}

/** Forward-slash form of a path, so references are identical across platforms. */
export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * Enumerates the files under one root lazily (fast-glob stream), one
 * DocumentInfo per file. The consumer owns each file stream and must close it.
 *
 * prefix   = "fs:" + absolute root (forward slashes)
 * filePath = path relative to the root (forward slashes)
 */
export class FileSystemSource implements DocumentSource {
  public readonly prefix: string;
  private readonly root: string;

  public constructor(private readonly opts: FileSystemSourceOptions) {
    this.root = path.resolve(opts.root);
    this.prefix = `fs:${toPosix(this.root)}`;
  }

  public async *documents(signal?: AbortSignal): AsyncGenerator<DocumentInfo> {
    const patterns = this.opts.allowedExt.map((ext) => `**/*.${ext.replace(/^\./, "")}`);
    if (!patterns.length) return;
    const entries = fg.stream(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: (this.opts.excludedFolders ?? []).map((f) => `**/${f}/**`),
    });
    for await (const entry of entries) {
      if (signal?.aborted) return;
      const rel = typeof entry === "string" ? entry : entry.toString("utf8");
      const filePath = toPosix(rel);
      yield createDocumentInfo({
        sourcePrefix: this.prefix,
        filePath,
        stream: fs.createReadStream(path.join(this.root, rel)),
        docType: resolveDocumentType(filePath, this.opts.documentTypes),
      });
    }
  }
}
