// Remote feed or local file could not be read
export class FetchError extends Error {
  constructor(
    readonly source: string,
    message: string,
    cause?: unknown
  ) {
    super(`Failed to fetch ${source}: ${message}`, { cause });
    this.name = "FetchError";
  }
}

export class ParseError extends Error {
  constructor(
    readonly subject: string,
    message: string
  ) {
    super(`${message}: "${subject}"`);
    this.name = "ParseError";
  }
}

export type LookupKind = "service" | "region";

export class LookupError extends Error {
  constructor(
    readonly value: string,
    readonly kind: LookupKind | "target"
  ) {
    super(`Unknown ${kind} "${value}"`);
    this.name = "LookupError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
