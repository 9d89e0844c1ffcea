export class PermissionDeniedError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, message: string, status = 403) {
    super(`${status} Forbidden ${url} → ${message || "token lacks permission"}`);
    this.name = "PermissionDeniedError";
    this.status = status;
    this.url = url;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
