/**
 * Options accepted by every channel error.
 */
export interface ChannelErrorOptions extends ErrorOptions {
  /** Location of the channel the error relates to */
  channel?: string;
}

/**
 * Base error for failures while loading or reading a channel.
 */
export class ChannelError extends Error {
  override name = "ChannelError";
  readonly channel?: string;

  constructor(message: string, options?: ChannelErrorOptions) {
    super(message, options);
    this.channel = options?.channel;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The channel document could be read but its contents are not usable.
 */
export class InvalidChannelFileError extends ChannelError {
  override name = "InvalidChannelFileError";
  readonly reason: string;

  constructor(channel: string, reason: string, options?: ErrorOptions) {
    super(`Channel ${channel} does not appear to be a valid channel file because ${reason}`, {
      ...options,
      channel
    });
    this.reason = reason;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface DownloaderErrorOptions extends ChannelErrorOptions {
  url: string;
  status?: number;
}

/**
 * Network failure reaching a URL. Raised only after the downloader gave up retrying.
 */
export class DownloaderError extends ChannelError {
  override name = "DownloaderError";
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: DownloaderErrorOptions) {
    super(message, options);
    this.url = options.url;
    this.status = options.status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A `schema_version` value that is malformed or names an unsupported generation.
 */
export class SchemaVersionError extends Error {
  override name = "SchemaVersionError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
