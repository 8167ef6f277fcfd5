import * as fs from 'fs';

export type DirectoryEntry =
  | { kind: 'file'; name: string }
  | { kind: 'directory'; name: string };

/**
 * Read-only view of the patient database. Listings carry no ordering guarantee.
 */
export interface FileSystemSource {
  list(dirPath: string): DirectoryEntry[];
  read(filePath: string): Uint8Array;
}

export class NodeFileSystem implements FileSystemSource {
  list(dirPath: string): DirectoryEntry[] {
    const entries: DirectoryEntry[] = [];
    for (const dirent of fs.readdirSync(dirPath, { withFileTypes: true })) {
      if (dirent.isDirectory()) {
        entries.push({ kind: 'directory', name: dirent.name });
      } else if (dirent.isFile()) {
        entries.push({ kind: 'file', name: dirent.name });
      }
      // Sockets, FIFOs and dangling links are not part of the database
    }
    return entries;
  }

  read(filePath: string): Uint8Array {
    // readFileSync opens and closes the descriptor inside the call
    return fs.readFileSync(filePath);
  }
}

/** Child directory names, sorted so traversal does not depend on listing order. */
export const directoryNames = (entries: DirectoryEntry[]): string[] =>
  entries
    .filter(entry => entry.kind === 'directory')
    .map(entry => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

export const hasFile = (entries: DirectoryEntry[], name: string): boolean =>
  entries.some(entry => entry.kind === 'file' && entry.name === name);
