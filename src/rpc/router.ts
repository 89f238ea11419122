import { RuntimeInputError, UnknownSessionError, type ChatCoreRuntime } from "../core/runtime.js";
import { SessionBusyError } from "../core/session.js";
import { normalizeUploadInput, type RuntimeUploadInput } from "../core/uploads.js";
import { ParamReader, RpcMethodError, type JsonRpcRequest } from "./protocol.js";

type MethodHandler = (params: ParamReader) => unknown;

export class RpcRouter {
  private readonly handlers: ReadonlyMap<string, MethodHandler>;

  constructor(private readonly runtime: ChatCoreRuntime) {
    this.handlers = new Map<string, MethodHandler>([
      ["system.ping", () => ({ ok: true, pong: true })],
      ["system.state", () => this.runtime.getState()],
      ["system.shutdown", (params) => this.runtime.shutdown(params.optionalName("reason"))],

      ["persona.list", () => this.runtime.listPersonas()],

      ["session.create", (params) => this.runtime.createSession({ persona: params.optionalName("persona") })],
      ["session.get", (params) => this.runtime.getSession(params.id("session_id"))],
      [
        "session.set_persona",
        (params) => this.runtime.setSessionPersona(params.id("session_id"), params.id("persona")),
      ],
      [
        "session.send",
        (params) =>
          this.runtime.sendSessionPrompt(params.id("session_id"), {
            prompt: params.text("prompt"),
            upload: readUpload(params, "file"),
          }),
      ],

      ["history.clear_request", (params) => this.runtime.historyClearRequest(params.id("session_id"))],
      ["history.clear_confirm", (params) => this.runtime.historyClearConfirm(params.id("session_id"))],
      ["history.clear_cancel", (params) => this.runtime.historyClearCancel(params.id("session_id"))],

      [
        "file.extract",
        (params) => {
          const upload = readUpload(params, "file");
          if (!upload) {
            throw params.invalid("`file` is required", "file");
          }
          return this.runtime.extractFile(upload);
        },
      ],
    ]);
  }

  methods(): string[] {
    return [...this.handlers.keys()];
  }

  async dispatch(request: JsonRpcRequest): Promise<unknown> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      throw new RpcMethodError(`method not found: ${request.method}`, {
        reason: "method_not_found",
        method: request.method,
      });
    }

    try {
      return await handler(new ParamReader(request.method, request.params));
    } catch (error) {
      throw toRpcError(error);
    }
  }
}

function readUpload(params: ParamReader, field: string): RuntimeUploadInput | undefined {
  const value = params.value(field);
  if (value === undefined || value === null) {
    return undefined;
  }
  const upload = normalizeUploadInput(value);
  if (!upload) {
    throw params.invalid(`\`${field}\` must be { path } or { name, data_base64 }`, field);
  }
  return upload;
}

function toRpcError(error: unknown): unknown {
  if (error instanceof RuntimeInputError) {
    return new RpcMethodError(error.message, { reason: "invalid_params" });
  }
  if (error instanceof UnknownSessionError) {
    return new RpcMethodError(error.message, { reason: "unknown_session" });
  }
  if (error instanceof SessionBusyError) {
    return new RpcMethodError(error.message, { reason: "session_busy" });
  }
  return error;
}
