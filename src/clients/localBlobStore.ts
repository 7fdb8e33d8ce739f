import fs from "fs";
import path from "path";

import type { BlobStore } from "../types/providerTypes";

/**
 * Blob store on the local disk, for development without S3.
 */
export class LocalBlobStore implements BlobStore {
  constructor(private readonly rootDir: string) {}

  private pathFor(key: string): string {
    const resolved = path.resolve(this.rootDir, key);
    const root = path.resolve(this.rootDir);
    if (!resolved.startsWith(root + path.sep)) {
      throw new Error(`Invalid blob key: ${key}`);
    }
    return resolved;
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    const filePath = this.pathFor(key);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, bytes);
  }

  async get(key: string): Promise<Buffer> {
    return fs.promises.readFile(this.pathFor(key));
  }

  async delete(key: string): Promise<void> {
    // already gone is fine
    await fs.promises.rm(this.pathFor(key), { force: true });
  }
}
