/** Base class for failures the CLI reports without a stack trace. */
export class ZipcastError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or conflicting arguments. Always raised before any network call. */
export class ConfigError extends ZipcastError {}

/** An upstream HTTP service failed, timed out, or answered with something unusable. */
export class UpstreamError extends ZipcastError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class InterruptedError extends ZipcastError {
  constructor() {
    super("Interrupted.");
  }
}
