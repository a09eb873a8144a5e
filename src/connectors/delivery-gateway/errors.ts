import { isObjectRecord } from "../../shared/payload.js";

export interface DeliveryGatewayErrorDetails {
  operation: string;
  /** HTTP status, absent when no response arrived. */
  status?: number;
  body?: string;
  timedOut?: boolean;
}

export class DeliveryGatewayError extends Error {
  readonly operation: string;
  readonly status: number | undefined;
  readonly body: string | undefined;
  readonly timedOut: boolean;

  constructor(message: string, details: DeliveryGatewayErrorDetails) {
    super(message);
    this.name = "DeliveryGatewayError";
    this.operation = details.operation;
    this.status = details.status;
    this.body = details.body;
    this.timedOut = details.timedOut ?? false;
  }
}

// 409 is left out: the gateway answers it for work it has already done.
function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

// Codes raised before a single byte of the request was sent.
const UNSENT_CONNECTION_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN"
]);

function connectionErrorCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (isObjectRecord(cause) && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

/**
 * For idempotent calls such as starting the dispatch: timeouts, transient
 * statuses and network failures are worth another attempt.
 */
export function isRetryableDeliveryError(error: unknown): boolean {
  if (error instanceof DeliveryGatewayError) {
    return error.timedOut || (error.status !== undefined && isTransientStatus(error.status));
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes("fetch failed") ||
    message.includes("socket") ||
    message.includes("network") ||
    message.includes("econnrefused") ||
    message.includes("econnreset")
  );
}

/**
 * For the batch import, which stores alerts on every accepted call: only
 * failures where the gateway cannot have stored the batch. A timeout or a
 * dropped connection may follow a successful write and is never resent.
 */
export function isUnsentImportError(error: unknown): boolean {
  if (error instanceof DeliveryGatewayError) {
    return !error.timedOut && (error.status === 429 || error.status === 503);
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const code = connectionErrorCode(error);
  return code !== undefined && UNSENT_CONNECTION_CODES.has(code);
}
