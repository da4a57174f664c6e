export class PartitionNotFoundError extends Error {
  readonly kind = "not-found" as const;

  constructor(
    readonly region: string,
    readonly year: string,
    readonly status: number | null,
  ) {
    super(`No data found for ${region} in ${year}`);
    this.name = "PartitionNotFoundError";
  }
}

export class PartitionTransportError extends Error {
  readonly kind = "transport" as const;

  constructor(
    readonly region: string,
    readonly year: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not load data for ${region} in ${year}: ${detail}`, options);
    this.name = "PartitionTransportError";
  }
}

export class ReferenceSourceError extends Error {
  readonly kind = "reference-source" as const;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Could not load the AD facility list (${detail})`, options);
    this.name = "ReferenceSourceError";
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

export const describeError = (error: unknown, fallback: string): string => {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error.trim()) return error;
  return fallback;
};
