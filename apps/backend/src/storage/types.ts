export type ResourceSnapshot = {
  bytes: Buffer;
  size: number;
  modifiedAt: Date;
  /** Weak validator derived from size and mtime. */
  etag: string;
};

export interface ResourceStore {
  kind: 'local';
  /** Absolute path the store reads from. */
  location: string;

  /**
   * Reads the current resource. Resolves to null when nothing is at the path.
   * Any other filesystem failure rejects.
   */
  read(): Promise<ResourceSnapshot | null>;
}
