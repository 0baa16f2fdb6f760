/** Non-2xx response from the Helix API. */
export class ApiError extends Error {
  constructor(
    readonly route: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Twitch API ${route} failed (${status}): ${body}`);
    this.name = 'ApiError';
  }

  /** 401/403: the client id or token was rejected. */
  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/** The request never produced a response: DNS, reset, or timeout. */
export class TransportError extends Error {
  constructor(
    readonly route: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Twitch API ${route} unreachable: ${message}`, options);
    this.name = 'TransportError';
  }
}

/** A 2xx response whose body does not have the expected shape. */
export class InvalidResponseError extends Error {
  constructor(
    readonly route: string,
    readonly issues: string[],
  ) {
    super(`Twitch API ${route} returned an unexpected payload: ${issues.join('; ')}`);
    this.name = 'InvalidResponseError';
  }
}
