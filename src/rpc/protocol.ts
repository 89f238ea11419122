import { isRecord } from "../core/values.js";

export const JSON_RPC_VERSION = "2.0" as const;

export type JsonRpcId = string | number | null;

export type JsonRpcRequest = {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type RpcErrorReason =
  | "parse_error"
  | "invalid_request"
  | "batch_not_supported"
  | "method_not_found"
  | "invalid_params"
  | "unknown_session"
  | "session_busy"
  | "internal_error";

// Every reason maps onto one wire code; session-level failures share -32000.
export const RPC_ERROR_CODES = {
  parse_error: -32700,
  invalid_request: -32600,
  batch_not_supported: -32600,
  method_not_found: -32601,
  invalid_params: -32602,
  internal_error: -32603,
  unknown_session: -32000,
  session_busy: -32000,
} as const satisfies Record<RpcErrorReason, number>;

export type RpcErrorData = {
  reason: RpcErrorReason;
  field?: string;
  method?: string;
};

export type RpcResponse =
  | { jsonrpc: typeof JSON_RPC_VERSION; id: JsonRpcId; result: unknown }
  | {
      jsonrpc: typeof JSON_RPC_VERSION;
      id: JsonRpcId;
      error: { code: number; message: string; data: RpcErrorData };
    };

export type RpcNotification = {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: string;
  params: unknown;
};

export class RpcMethodError extends Error {
  readonly code: number;

  constructor(
    message: string,
    readonly data: RpcErrorData,
  ) {
    super(message);
    this.name = "RpcMethodError";
    this.code = RPC_ERROR_CODES[data.reason];
  }
}

export function rpcResult(id: JsonRpcId, result: unknown): RpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

/** Anything that is not an RpcMethodError is reported as an internal error. */
export function rpcError(id: JsonRpcId, error: unknown): RpcResponse {
  const failure =
    error instanceof RpcMethodError
      ? error
      : new RpcMethodError(error instanceof Error ? error.message : String(error), { reason: "internal_error" });
  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    error: { code: failure.code, message: failure.message, data: failure.data },
  };
}

export function rpcNotification(method: string, params: unknown): RpcNotification {
  return { jsonrpc: JSON_RPC_VERSION, method, params };
}

export type IncomingMessage =
  | { kind: "empty" }
  | { kind: "request"; request: JsonRpcRequest }
  | { kind: "notification"; method: string }
  | { kind: "rejected"; error: RpcMethodError };

/** Classifies one line read from the transport. */
export function classifyIncoming(line: string): IncomingMessage {
  const raw = line.trim();
  if (!raw) {
    return { kind: "empty" };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { kind: "rejected", error: new RpcMethodError(`parse error: ${detail}`, { reason: "parse_error" }) };
  }

  if (Array.isArray(payload)) {
    return {
      kind: "rejected",
      error: new RpcMethodError("batch requests are not supported", { reason: "batch_not_supported" }),
    };
  }
  if (!isRecord(payload) || payload.jsonrpc !== JSON_RPC_VERSION) {
    return { kind: "rejected", error: new RpcMethodError("invalid request", { reason: "invalid_request" }) };
  }
  const method = payload.method;
  if (typeof method !== "string" || !method.trim()) {
    return { kind: "rejected", error: new RpcMethodError("invalid request", { reason: "invalid_request" }) };
  }

  if (!("id" in payload)) {
    return { kind: "notification", method };
  }
  const id = payload.id;
  if (typeof id !== "string" && typeof id !== "number" && id !== null) {
    return { kind: "rejected", error: new RpcMethodError("invalid request id", { reason: "invalid_request" }) };
  }
  return { kind: "request", request: { jsonrpc: JSON_RPC_VERSION, id, method, params: payload.params } };
}

/** Typed access to one request's params; every failure names the method and field. */
export class ParamReader {
  private readonly params: Record<string, unknown>;

  constructor(
    readonly method: string,
    params: unknown,
  ) {
    if (params === undefined) {
      this.params = {};
    } else if (isRecord(params)) {
      this.params = params;
    } else {
      throw this.invalid("expected object");
    }
  }

  value(field: string): unknown {
    return this.params[field];
  }

  /** Required identifier-like string, trimmed. */
  id(field: string): string {
    const value = this.params[field];
    if (typeof value !== "string" || !value.trim()) {
      throw this.invalid(`\`${field}\` must be a non-empty string`, field);
    }
    return value.trim();
  }

  /** Required free text, returned exactly as sent. */
  text(field: string): string {
    const value = this.params[field];
    if (typeof value !== "string" || !value.trim()) {
      throw this.invalid(`\`${field}\` must be a non-empty string`, field);
    }
    return value;
  }

  optionalName(field: string): string | undefined {
    const value = this.params[field];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "string") {
      throw this.invalid(`\`${field}\` must be a string`, field);
    }
    return value.trim() || undefined;
  }

  invalid(detail: string, field?: string): RpcMethodError {
    return new RpcMethodError(`invalid params for ${this.method}: ${detail}`, { reason: "invalid_params", field });
  }
}
