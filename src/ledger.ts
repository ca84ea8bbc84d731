import fs from "node:fs/promises";
import path from "node:path";
import { log } from "./log";
import type { DocumentHash, HashLedgerStore } from "./types";

/**
 * On-disk layout of the ledger file:
 *   { "version": 1, "entries": { "<documentReference>": "<sha256 hex>" } }
 */
interface LedgerFile {
  version: number;
  entries: Record<string, string>;
}

/** Ledger kept only in memory. Used when no LEDGER_PATH is configured, and in tests. */
export class MemoryHashLedger implements HashLedgerStore {
  protected readonly entries = new Map<string, string>();

  public async get(documentReference: string): Promise<DocumentHash | undefined> {
    const hash = this.entries.get(documentReference);
    return hash === undefined ? undefined : { documentReference, hash };
  }

  public async insert(entry: DocumentHash): Promise<void> {
    this.entries.set(entry.documentReference, entry.hash);
  }

  public async update(entry: DocumentHash, hash: string): Promise<void> {
    this.entries.set(entry.documentReference, hash);
  }

  public async delete(documentReferences: readonly string[]): Promise<void> {
    for (const ref of documentReferences) this.entries.delete(ref);
  }

  /** Number of tracked references. */
  public size(): number {
    return this.entries.size;
  }
}

/**
 * JSON-file ledger. The file is read lazily on first use and rewritten after
 * every mutation through a temp file and a rename.
 */
export class JsonHashLedger extends MemoryHashLedger {
  private loading: Promise<void> | null = null;

  public constructor(private readonly filePath: string) {
    super();
  }

  public override async get(documentReference: string): Promise<DocumentHash | undefined> {
    await this.load();
    return super.get(documentReference);
  }

  public override async insert(entry: DocumentHash): Promise<void> {
    await this.load();
    await super.insert(entry);
    await this.save();
  }

  public override async update(entry: DocumentHash, hash: string): Promise<void> {
    await this.load();
    await super.update(entry, hash);
    await this.save();
  }

  public override async delete(documentReferences: readonly string[]): Promise<void> {
    if (!documentReferences.length) return;
    await this.load();
    await super.delete(documentReferences);
    await this.save();
  }

  /**
   * Read the file once; concurrent callers share the read. A failed read is
   * not memoized, so nothing is written over a file that was never loaded.
   */
  private load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readFile().catch((e: unknown) => {
        this.loading = null;
        throw e;
      });
    }
    return this.loading;
  }

  private async readFile(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return; // first run
      throw e;
    }
    let parsed: unknown = null;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      log.debug(`Ledger parse error: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isLedgerFile(parsed)) {
      log.warn(`Ledger at ${this.filePath} is malformed; starting with an empty ledger.`);
      return;
    }
    for (const [ref, hash] of Object.entries(parsed.entries)) {
      if (typeof hash === "string") this.entries.set(ref, hash);
    }
    log.debug(`Loaded ${this.entries.size} ledger entries from ${this.filePath}`);
  }

  private async save(): Promise<void> {
    const out: LedgerFile = { version: 1, entries: Object.fromEntries(this.entries) };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out), "utf8");
    await fs.rename(tmp, this.filePath);
  }
}

function isLedgerFile(v: unknown): v is LedgerFile {
  return (
    typeof v === "object" &&
    v !== null &&
    "entries" in v &&
    typeof v.entries === "object" &&
    v.entries !== null
  );
}

export function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
