import type { ChatMessage, ImagePayload } from "../chat-types.js";

export type ConversationSnapshot = {
  messages: readonly ChatMessage[];
  pendingClear: boolean;
};

/**
 * Ordered, append-only message log for one session. The only way to drop
 * messages is the two-step clear: `requestClear` arms it, then `confirmClear`
 * empties the log or `cancelClear` disarms it.
 *
 * Image bytes are copied on append, so later writes to the caller's buffer
 * do not reach the log. Typed arrays cannot be frozen.
 */
export class ConversationStore {
  private messages: ChatMessage[] = [];
  private pendingClearFlag = false;

  get size(): number {
    return this.messages.length;
  }

  get pendingClear(): boolean {
    return this.pendingClearFlag;
  }

  append(message: ChatMessage): ChatMessage {
    if (message.content === undefined && !message.image && !message.generatedImage) {
      throw new Error("message needs content, an image, or a generated image");
    }
    const stored: ChatMessage = { ...message };
    if (message.image) {
      stored.image = storePayload(message.image);
    }
    if (message.generatedImage) {
      stored.generatedImage = storePayload(message.generatedImage);
    }
    const frozen = Object.freeze(stored);
    this.messages.push(frozen);
    return frozen;
  }

  list(): readonly ChatMessage[] {
    return this.messages.slice();
  }

  last(): ChatMessage | undefined {
    return this.messages[this.messages.length - 1];
  }

  requestClear(): void {
    this.pendingClearFlag = true;
  }

  confirmClear(): number {
    if (!this.pendingClearFlag) {
      return 0;
    }
    const cleared = this.messages.length;
    this.messages = [];
    this.pendingClearFlag = false;
    return cleared;
  }

  cancelClear(): void {
    this.pendingClearFlag = false;
  }

  snapshot(): ConversationSnapshot {
    return {
      messages: this.list(),
      pendingClear: this.pendingClearFlag,
    };
  }
}

function storePayload(payload: ImagePayload): ImagePayload {
  return Object.freeze({ ...payload, data: Uint8Array.from(payload.data) });
}
