/**
 * Provider errors
 *
 * Control-plane failures are translated into a single error type carrying a
 * category and operator suggestions, so the CLI can print them uniformly.
 */

export enum ProviderErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  METADATA = "METADATA",
  TIMEOUT = "TIMEOUT",
  UNKNOWN = "UNKNOWN",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly originalError?: Error,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/**
 * Shape of a service error raised by the OCI SDK.
 */
interface OciServiceError extends Error {
  statusCode: number;
  serviceCode?: string;
}

function isOciServiceError(error: unknown): error is OciServiceError {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

const NETWORK_ERROR_CODES = ["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EHOSTUNREACH"];

function classify(error: Error): { type: ProviderErrorType; suggestions?: string[] } {
  if (isOciServiceError(error)) {
    const serviceCode = error.serviceCode ?? "";
    if (serviceCode === "LimitExceeded" || serviceCode === "QuotaExceeded" || error.statusCode === 429) {
      return {
        type: ProviderErrorType.QUOTA_EXCEEDED,
        suggestions: ["Release unused reserved public IPs or request a service limit increase"],
      };
    }
    switch (error.statusCode) {
      case 401:
        return {
          type: ProviderErrorType.AUTHENTICATION,
          suggestions: ["Make sure the instance belongs to a dynamic group"],
        };
      case 403:
        return { type: ProviderErrorType.AUTHORIZATION };
      case 404:
        return {
          type: ProviderErrorType.NOT_FOUND,
          suggestions: [
            "Check the OCID is correct",
            "Grant the instance's dynamic group 'manage virtual-network-family' and 'use instances' in the compartment",
          ],
        };
      case 409:
        return { type: ProviderErrorType.ALREADY_EXISTS };
    }
  }

  if (NETWORK_ERROR_CODES.some((code) => error.message.includes(code))) {
    return { type: ProviderErrorType.NETWORK };
  }

  return { type: ProviderErrorType.UNKNOWN };
}

/**
 * Translate any thrown value into a ProviderError.
 *
 * @param operation - What was being attempted, e.g. "attach VNIC"
 */
export function toProviderError(error: unknown, operation: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const original = error instanceof Error ? error : new Error(String(error));
  const { type, suggestions } = classify(original);
  return new ProviderError(`Failed to ${operation}: ${original.message}`, type, original, suggestions);
}
