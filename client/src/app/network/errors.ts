export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class ConnectError extends Error {
  constructor(readonly url: string, cause: unknown) {
    super(`connect ${url}: ${describeError(cause)}`, { cause });
    this.name = "ConnectError";
  }
}

export class ReadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(`read: ${message}`, { cause });
    this.name = "ReadError";
  }
}

export class WriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(`write: ${message}`, { cause });
    this.name = "WriteError";
  }
}
