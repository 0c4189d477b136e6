// src/services/fileTenderStore.ts
import { promises as fs } from "fs";
import path from "path";
import type { Tender } from "../types/tender";
import { parseTenders } from "./tenderRows";
import {
  storeNotice,
  type StoreReadResult,
  type StoreWriteResult,
  type TenderStore,
} from "./tenderStore";

class CorruptStoreError extends Error {
  constructor(file: string, cause: unknown) {
    super(`${file} is not a readable tender list (${cause instanceof Error ? cause.message : String(cause)})`);
    this.name = "CorruptStoreError";
  }
}

/**
 * Flat JSON file holding every tender with its drafts nested.
 * Writes go to `<file>.tmp` and are renamed into place, one at a time.
 */
export class FileTenderStore implements TenderStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly file: string) {}

  async loadAll(): Promise<StoreReadResult> {
    try {
      return { data: await this.read(), error: null };
    } catch (err) {
      console.error("[FileTenderStore] load failed:", err);
      return { data: [], error: storeNotice("loading tenders", err) };
    }
  }

  async save(tender: Tender): Promise<StoreWriteResult> {
    return this.saveMany([tender]);
  }

  async saveMany(tenders: Tender[]): Promise<StoreWriteResult> {
    const action = tenders.length === 1 ? "saving tender" : "saving tenders";
    return this.mutate(action, (current) => {
      const byId = new Map(current.map((t) => [t.id, t]));
      for (const t of tenders) byId.set(t.id, t);
      return [...byId.values()].sort((a, b) => a.id - b.id);
    });
  }

  async delete(id: number): Promise<StoreWriteResult> {
    return this.mutate("deleting tender", (current) => current.filter((t) => t.id !== id));
  }

  private mutate(
    action: string,
    change: (current: Tender[]) => Tender[]
  ): Promise<StoreWriteResult> {
    const run = async (): Promise<StoreWriteResult> => {
      try {
        const next = change(await this.read());
        await this.write(next);
        return { error: null };
      } catch (err) {
        console.error(`[FileTenderStore] ${action} failed:`, err);
        return { error: storeNotice(action, err) };
      }
    };
    const result = this.queue.then(run);
    this.queue = result;
    return result;
  }

  private async read(): Promise<Tender[]> {
    let text: string;
    try {
      text = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    if (!text.trim()) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new CorruptStoreError(this.file, err);
    }
    if (!Array.isArray(parsed)) {
      throw new CorruptStoreError(this.file, "expected an array");
    }
    return parseTenders(parsed);
  }

  private async write(tenders: Tender[]): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(tenders, null, 2), "utf8");
    await fs.rename(tmp, this.file);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
