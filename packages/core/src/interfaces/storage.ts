/**
 * StorageProvider
 * Key/value persistence used for cookies and other client state.
 */
export interface StorageProvider {
  /**
   * Read a stored value
   * @returns the value, or null when the key was never written
   */
  read(key: string): Promise<string | null>;

  write(key: string, value: string): Promise<void>;

  remove(key: string): Promise<void>;
}
