export interface RecordStore<T> {
  get(id: string): Promise<T | undefined>;
  put(id: string, record: T): Promise<void>;
  has(id: string): Promise<boolean>;
  list(): Promise<Array<{ id: string; record: T }>>;
  size(): Promise<number>;
}

export class InMemoryRecordStore<T> implements RecordStore<T> {
  private records = new Map<string, T>();

  async get(id: string): Promise<T | undefined> {
    return this.records.get(id);
  }

  async put(id: string, record: T): Promise<void> {
    this.records.set(id, record);
  }

  async has(id: string): Promise<boolean> {
    return this.records.has(id);
  }

  // Insertion order.
  async list(): Promise<Array<{ id: string; record: T }>> {
    return Array.from(this.records, ([id, record]) => ({ id, record }));
  }

  async size(): Promise<number> {
    return this.records.size;
  }
}
