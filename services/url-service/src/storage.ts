export interface UrlRecord {
  readonly id: string;
  readonly originalUrl: string;
  readonly shortCode: string;
  readonly createdAt: Date;
  readonly accessCount: number;
}

/**
 * Mapping from short code to record. Absence is a `null`/`false` result, never an error.
 */
export interface UrlStore {
  init(): Promise<void>;
  ping(): Promise<void>;
  /** Adds or overwrites; the record is visible to `get` once the promise resolves. */
  insert(code: string, record: UrlRecord): Promise<void>;
  /** Adds only when `code` is free. Returns false when it is already taken. */
  insertIfAbsent(code: string, record: UrlRecord): Promise<boolean>;
  get(code: string): Promise<UrlRecord | null>;
  /** Adds exactly one to the access count. False when the code is unknown. */
  incrementAccess(code: string): Promise<boolean>;
  listAll(): Promise<UrlRecord[]>;
  count(): Promise<number>;
  totalClicks(): Promise<number>;
  close(): Promise<void>;
}
