import type { BackgroundTasks } from "./background_tasks.js";
import { generateCode, RECORD_ID_LENGTH, SHORT_CODE_LENGTH } from "./code_generator.js";
import type { UrlRecord, UrlStore } from "./storage.js";

export class CodeGenerationError extends Error {
  constructor(readonly attempts: number) {
    super(`Failed to generate unique code after ${attempts} attempts`);
    this.name = "CodeGenerationError";
  }
}

export interface Analytics {
  totalUrls: number;
  totalClicks: number;
  urls: UrlRecord[];
}

export interface ShortenerDeps {
  store: UrlStore;
  tasks: BackgroundTasks;
  baseUrl: string;
  codeLength?: number;
  idLength?: number;
  maxCodeAttempts?: number;
  generate?: (length: number) => string;
  now?: () => Date;
}

export interface ShortenerService {
  shorten(url: string): Promise<UrlRecord>;
  resolve(code: string): Promise<UrlRecord | null>;
  list(): Promise<UrlRecord[]>;
  analytics(): Promise<Analytics>;
  shortUrlFor(record: UrlRecord): string;
  close(timeoutMs: number): Promise<boolean>;
}

// Stores enumerate in insertion order; reversing first lets a stable sort break
// ties newest-insert first.
function newestInsertFirst(records: UrlRecord[]): UrlRecord[] {
  return records.slice().reverse();
}

export function createShortenerService(deps: ShortenerDeps): ShortenerService {
  const {
    store,
    tasks,
    codeLength = SHORT_CODE_LENGTH,
    idLength = RECORD_ID_LENGTH,
    maxCodeAttempts = 5,
    generate = generateCode,
    now = () => new Date()
  } = deps;
  const baseUrl = deps.baseUrl.replace(/\/+$/, "");

  return {
    async shorten(url) {
      for (let i = 0; i < maxCodeAttempts; i++) {
        const shortCode = generate(codeLength);
        const rec: UrlRecord = {
          id: generate(idLength),
          originalUrl: url,
          shortCode,
          createdAt: now(),
          accessCount: 0
        };
        if (await store.insertIfAbsent(shortCode, rec)) return rec;
      }
      throw new CodeGenerationError(maxCodeAttempts);
    },

    async resolve(code) {
      const rec = await store.get(code);
      if (!rec) return null;

      // the redirect must not wait on the counter
      tasks.submit("increment_access", () => store.incrementAccess(code));
      return rec;
    },

    async list() {
      const all = await store.listAll();
      return newestInsertFirst(all).sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    },

    async analytics() {
      const [all, totalUrls, totalClicks] = await Promise.all([
        store.listAll(),
        store.count(),
        store.totalClicks()
      ]);
      const urls = newestInsertFirst(all).sort((a, b) => b.accessCount - a.accessCount);
      return { totalUrls, totalClicks, urls };
    },

    shortUrlFor(record) {
      return `${baseUrl}/${record.shortCode}`;
    },

    async close(timeoutMs) {
      const drained = await tasks.close(timeoutMs);
      await store.close();
      return drained;
    }
  };
}
