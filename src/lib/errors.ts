import type { PlatformErrorKind } from "@/src/lib/types";

export type CollectionErrorKind = "PrivateOrEmptyProfile" | "UpstreamTransient";

const COLLECTION_ERROR_COPY: Record<CollectionErrorKind, { message: string; hint: string }> = {
  PrivateOrEmptyProfile: {
    message: "We couldn't access this account's game library.",
    hint: "Set Game details to Public in your Steam privacy settings, then try again."
  },
  UpstreamTransient: {
    message: "Steam didn't respond in time.",
    hint: "This is usually temporary. Try again in a minute."
  }
};

export class PlatformApiError extends Error {
  readonly kind: PlatformErrorKind;
  readonly status: number | null;

  constructor(kind: PlatformErrorKind, message: string, status: number | null = null) {
    super(message);
    this.name = "PlatformApiError";
    this.kind = kind;
    this.status = status;
  }
}

export class CollectionError extends Error {
  readonly kind: CollectionErrorKind;
  readonly hint: string;
  readonly retryable: boolean;

  constructor(kind: CollectionErrorKind, options: { cause?: unknown } = {}) {
    super(COLLECTION_ERROR_COPY[kind].message, { cause: options.cause });
    this.name = "CollectionError";
    this.kind = kind;
    this.hint = COLLECTION_ERROR_COPY[kind].hint;
    this.retryable = kind === "UpstreamTransient";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const isAbortError = (error: unknown) =>
  error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
