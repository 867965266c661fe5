export { InMemoryStorageProvider } from './in-memory.js';
export { FileStorageProvider } from './file.js';
