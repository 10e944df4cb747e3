export class StoredFileNotFound extends Error {
  constructor(readonly key: string) {
    super(`Stored file ${key} not found`);
    this.name = 'StoredFileNotFound';
  }
}

/** Durable storage for uploaded submission files. */
export abstract class FileStore {
  abstract upload(
    filename: string,
    body: Buffer,
    contentType: string,
  ): Promise<{ key: string }>;

  /** Throws StoredFileNotFound for a missing key; other errors are outages. */
  abstract download(key: string): Promise<Buffer>;
}
