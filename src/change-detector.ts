import { createHash } from "node:crypto";
import type { HashLedgerStore } from "./types";

/**
 * Content-hash skip logic. Sole owner of the hash ledger: nothing else writes
 * to the store, reconciliation goes through {@link forget}.
 */
export class ChangeDetector {
  public constructor(private readonly ledger: HashLedgerStore) {}

  /** Lowercase hex SHA-256 of the UTF-8 encoded text. */
  public static computeHash(text: string): string {
    return createHash("sha256").update(text, "utf8").digest("hex");
  }

  /**
   * Decide whether a document can be skipped, recording its hash as a side
   * effect: unknown reference → inserted, not skipped; changed hash → updated,
   * not skipped; same hash → skipped.
   */
  public async shouldSkip(documentReference: string, fullText: string): Promise<boolean> {
    const hash = ChangeDetector.computeHash(fullText);
    const existing = await this.ledger.get(documentReference);
    if (!existing) {
      await this.ledger.insert({ documentReference, hash });
      return false;
    }
    if (existing.hash !== hash) {
      await this.ledger.update(existing, hash);
      return false;
    }
    return true;
  }

  /** Drop ledger entries for references that no longer exist at their source. */
  public async forget(documentReferences: readonly string[]): Promise<void> {
    if (!documentReferences.length) return;
    await this.ledger.delete(documentReferences);
  }
}
