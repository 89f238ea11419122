import type { RuntimeEvent } from "../core/runtime.js";
import { rpcNotification, type RpcNotification } from "./protocol.js";

export type RpcEventEnvelope = {
  type: RuntimeEvent["type"];
  timestamp: string;
  payload: RuntimeEvent["payload"];
};

export function buildEventNotification(event: RuntimeEvent, now: Date = new Date()): RpcNotification {
  const envelope: RpcEventEnvelope = {
    type: event.type,
    timestamp: now.toISOString(),
    payload: event.payload,
  };
  return rpcNotification("event", envelope);
}
