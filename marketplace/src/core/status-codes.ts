/**
 * Remote status code taxonomy.
 *
 * Every response is folded into one of four outcomes. Callers switch on
 * `kind` and must handle all of them (see `assertNever`).
 */

export const StatusCodes = {
  DONE: 200,
  CREATED: 201,
  PROCESSING: 202,
  REDIRECT: 302,
  MALFORMED: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  DONE_WITH_ERRORS: 409,
  JOB_FAILED: 410,
  JOB_TIMEOUT: 499,
  SERVER_DOWN: 500,
  API_DISABLED: 503,
  /** No HTTP status at all: the request never completed */
  TRANSPORT_FAILURE: 0,
} as const;

export type ClientErrorReason =
  | "redirect"
  | "malformed"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "rejected";

export type ServerErrorReason =
  | "done_with_errors"
  | "job_failed"
  | "timeout"
  | "server_down"
  | "api_disabled"
  | "transport"
  | "unexpected";

export type RemoteOutcome =
  | { kind: "success"; status: number; created: boolean }
  | { kind: "processing"; status: number }
  | { kind: "client_error"; status: number; reason: ClientErrorReason }
  | { kind: "server_error"; status: number; reason: ServerErrorReason };

export type FailureOutcome = Extract<
  RemoteOutcome,
  { kind: "client_error" | "server_error" }
>;

export function classifyStatus(status: number): RemoteOutcome {
  switch (status) {
    case StatusCodes.DONE:
      return { kind: "success", status, created: false };
    case StatusCodes.CREATED:
      return { kind: "success", status, created: true };
    case StatusCodes.PROCESSING:
      return { kind: "processing", status };
    case StatusCodes.MALFORMED:
      return { kind: "client_error", status, reason: "malformed" };
    case StatusCodes.UNAUTHORIZED:
      return { kind: "client_error", status, reason: "unauthorized" };
    case StatusCodes.FORBIDDEN:
      return { kind: "client_error", status, reason: "forbidden" };
    case StatusCodes.NOT_FOUND:
      return { kind: "client_error", status, reason: "not_found" };
    case StatusCodes.DONE_WITH_ERRORS:
      return { kind: "server_error", status, reason: "done_with_errors" };
    case StatusCodes.JOB_FAILED:
      return { kind: "server_error", status, reason: "job_failed" };
    case StatusCodes.JOB_TIMEOUT:
      return { kind: "server_error", status, reason: "timeout" };
    case StatusCodes.SERVER_DOWN:
      return { kind: "server_error", status, reason: "server_down" };
    case StatusCodes.API_DISABLED:
      return { kind: "server_error", status, reason: "api_disabled" };
    case StatusCodes.TRANSPORT_FAILURE:
      return { kind: "server_error", status, reason: "transport" };
  }

  // Codes outside the documented set fall back to their class
  if (status >= 200 && status < 300) {
    return { kind: "success", status, created: false };
  }
  if (status >= 300 && status < 400) {
    return { kind: "client_error", status, reason: "redirect" };
  }
  if (status >= 400 && status < 500) {
    return { kind: "client_error", status, reason: "rejected" };
  }
  return { kind: "server_error", status, reason: "unexpected" };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled outcome: ${JSON.stringify(value)}`);
}
