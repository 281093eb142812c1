import fs from "node:fs/promises";
import path from "node:path";
import type { DocumentRecord } from "../types/models";
import { storagePaths } from "../utils/storage";

interface Database {
  documents: Record<string, DocumentRecord>;
}

const emptyDatabase = (): Database => ({ documents: {} });

const isDatabase = (value: unknown): value is Database => {
  if (typeof value !== "object" || value === null || !("documents" in value)) {
    return false;
  }
  const { documents } = value;
  return typeof documents === "object" && documents !== null && !Array.isArray(documents);
};

/** Document records kept in one JSON file, rewritten on every change. */
export class StoreService {
  private db: Database = emptyDatabase();

  constructor(private readonly dbFilePath: string = path.join(storagePaths.data, "db.json")) {}

  async init(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.dbFilePath, "utf-8");
    } catch {
      await this.reset();
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }

    if (!isDatabase(parsed)) {
      console.warn(`[store] ${this.dbFilePath} is not a document store, starting empty`);
      await this.reset();
      return;
    }
    this.db = parsed;
  }

  private async reset(): Promise<void> {
    this.db = emptyDatabase();
    await this.persist();
  }

  private async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.dbFilePath), { recursive: true });
    await fs.writeFile(this.dbFilePath, JSON.stringify(this.db, null, 2), "utf-8");
  }

  getDocument(documentId: string): DocumentRecord | undefined {
    return this.db.documents[documentId];
  }

  /** Newest first. */
  listDocuments(): DocumentRecord[] {
    return Object.values(this.db.documents).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async upsertDocument(record: DocumentRecord): Promise<void> {
    this.db.documents[record.id] = record;
    await this.persist();
  }
}
