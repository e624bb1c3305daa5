/**
 * Application error carrying an HTTP-style status and a stable machine code,
 * so a surrounding service layer can map it onto a response without parsing
 * messages.
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * An external collaborator (item store, exploration source) failed.
 * The engine never retries; backoff belongs to the caller.
 */
export class UpstreamUnavailableError extends AppError {
  constructor(
    public upstream: string,
    cause?: unknown,
  ) {
    super(503, 'UPSTREAM_UNAVAILABLE', `Upstream unavailable: ${upstream}`, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/** Invalid environment or ranking configuration, raised at construction. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}
