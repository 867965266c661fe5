import type { StorageProvider } from '../interfaces/storage.js';

/**
 * InMemoryStorageProvider
 * Default StorageProvider; keeps values for the lifetime of the process.
 * Use FileStorageProvider when cookies must survive restarts.
 */
export class InMemoryStorageProvider implements StorageProvider {
  private values = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async remove(key: string): Promise<void> {
    this.values.delete(key);
  }

  /**
   * Clear all data (useful for testing)
   */
  clear(): void {
    this.values.clear();
  }
}
