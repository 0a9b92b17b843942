export class HttpStatusError extends Error {
  readonly name = "HttpStatusError";

  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
  }
}

export class AuthTokenMissingError extends Error {
  readonly name = "AuthTokenMissingError";

  constructor(url: string) {
    super(`No CSRF token found on ${url}`);
  }
}

export class LoginRejectedError extends Error {
  readonly name = "LoginRejectedError";

  constructor(
    readonly username: string,
    readonly status: number
  ) {
    super(`Login rejected for ${username} (HTTP ${status})`);
  }
}

export class ArtifactMissingError extends Error {
  readonly name = "ArtifactMissingError";

  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
  }
}

export class PageFetchError extends Error {
  readonly name = "PageFetchError";

  constructor(
    readonly page: number,
    readonly attempts: number,
    readonly cause: unknown
  ) {
    super(`Giving up on page ${page} after ${attempts} attempts`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
