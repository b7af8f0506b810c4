export type ObjectUrlFactory = {
  create: (blob: Blob) => string;
  revoke: (url: string) => void;
};

export const browserObjectUrls: ObjectUrlFactory = {
  create: (blob) => URL.createObjectURL(blob),
  revoke: (url) => URL.revokeObjectURL(url),
};

/** Owns the single object URL currently rendered by a viewer. */
export class DisplayHandle {
  private url: string | null = null;

  constructor(private readonly urls: ObjectUrlFactory = browserObjectUrls) {}

  get current(): string | null {
    return this.url;
  }

  /** Publishes a new blob and revokes the one it supersedes. */
  replace(blob: Blob): string {
    const previous = this.url;
    this.url = this.urls.create(blob);
    if (previous) this.urls.revoke(previous);
    return this.url;
  }

  release(): void {
    if (!this.url) return;
    this.urls.revoke(this.url);
    this.url = null;
  }
}
