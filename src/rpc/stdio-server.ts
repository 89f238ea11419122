import { once } from "node:events";
import readline from "node:readline";
import type { AppConfig } from "../config.js";
import { ChatCoreRuntime } from "../core/runtime.js";
import { buildEventNotification } from "./events.js";
import { classifyIncoming, rpcError, rpcResult, type RpcNotification, type RpcResponse } from "./protocol.js";
import { RpcRouter } from "./router.js";

export type RpcLineWriter = (message: RpcResponse | RpcNotification) => void;

/**
 * Handles one inbound line. Requests are answered through `write`; client
 * notifications get no reply. Resolves once the reply has been written.
 */
export function createLineHandler(
  router: RpcRouter,
  write: RpcLineWriter,
  onShutdownAccepted: () => void = () => undefined,
): (line: string) => Promise<void> {
  return async (line) => {
    const incoming = classifyIncoming(line);
    if (incoming.kind === "empty" || incoming.kind === "notification") {
      return;
    }
    if (incoming.kind === "rejected") {
      write(rpcError(null, incoming.error));
      return;
    }

    const { request } = incoming;
    let response: RpcResponse;
    try {
      response = rpcResult(request.id, await router.dispatch(request));
    } catch (error) {
      write(rpcError(request.id, error));
      return;
    }
    write(response);
    if (request.method === "system.shutdown") {
      onShutdownAccepted();
    }
  };
}

export async function startRpcStdioServer(config: AppConfig): Promise<void> {
  const log = (message: string) => {
    console.error(`[pitchdesk] ${message}`);
  };
  const write: RpcLineWriter = (message) => {
    process.stdout.write(`${JSON.stringify(message)}\n`);
  };

  const runtime = ChatCoreRuntime.create(config, log);
  const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

  let accepting = true;
  const stop = () => {
    accepting = false;
    input.close();
  };

  const detach = runtime.onEvent((event) => write(buildEventNotification(event)));
  const handleLine = createLineHandler(new RpcRouter(runtime), write, stop);

  input.on("line", (line) => {
    if (!accepting) {
      return;
    }
    handleLine(line).catch((error: unknown) => {
      log(`failed to answer request: ${error instanceof Error ? error.message : String(error)}`);
    });
  });

  const onSignal = (signal: NodeJS.Signals) => {
    log(`received ${signal}`);
    void runtime.shutdown(signal.toLowerCase()).finally(stop);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  log(`rpc server ready (text model ${config.textModel}, image model ${config.imageModel})`);
  await once(input, "close");

  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
  // runtime.shutdown is idempotent; this covers stdin reaching EOF
  await runtime.shutdown("stdin_closed");
  detach();
}
