import type { ChatMessage, ModelGateway, Persona, UploadedFile } from "../chat-types.js";
import { describeImageFault, describeTextFault } from "../gemini.js";
import { assembleModelRequest, buildUserMessage, type AudioTranscriber } from "./context.js";
import { ConversationStore, type ConversationSnapshot } from "./conversation.js";

export class SessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`session ${sessionId} is still running a turn`);
    this.name = "SessionBusyError";
  }
}

export type TurnInput = {
  prompt: string;
  upload?: UploadedFile;
};

export type TurnResult = {
  userMessage: ChatMessage;
  assistantMessage: ChatMessage;
};

export type ChatSessionHooks = {
  onTurnStarted?: (persona: Persona) => void;
  onMessageAppended?: (message: ChatMessage) => void;
};

export type ChatSessionOptions = {
  id: string;
  persona: Persona;
  gateway: ModelGateway;
  transcriber?: AudioTranscriber;
};

export type SessionState = ConversationSnapshot & {
  id: string;
  persona: string;
  busy: boolean;
};

export class ChatSession {
  readonly id: string;
  private personaValue: Persona;
  private readonly store = new ConversationStore();
  private busy = false;

  constructor(private readonly options: ChatSessionOptions) {
    this.id = options.id;
    this.personaValue = options.persona;
  }

  get persona(): Persona {
    return this.personaValue;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  setPersona(persona: Persona): void {
    this.personaValue = persona;
  }

  async runTurn(input: TurnInput, hooks: ChatSessionHooks = {}): Promise<TurnResult> {
    // whitespace-only prompts are rejected, everything else is kept verbatim
    const prompt = input.prompt;
    if (!prompt.trim()) {
      throw new Error("prompt is empty");
    }
    if (this.busy) {
      throw new SessionBusyError(this.id);
    }

    this.busy = true;
    try {
      const persona = this.personaValue;
      hooks.onTurnStarted?.(persona);

      const userMessage = this.append(
        hooks,
        await buildUserMessage({
          persona,
          prompt,
          upload: input.upload,
          transcriber: this.options.transcriber,
        }),
      );

      const assistantMessage = this.append(
        hooks,
        persona.kind === "image"
          ? await this.generateImageReply(prompt)
          : await this.generateTextReply(persona, userMessage),
      );

      return { userMessage, assistantMessage };
    } finally {
      this.busy = false;
    }
  }

  requestClear(): void {
    this.store.requestClear();
  }

  confirmClear(): number {
    if (this.busy) {
      throw new SessionBusyError(this.id);
    }
    return this.store.confirmClear();
  }

  cancelClear(): void {
    this.store.cancelClear();
  }

  messages(): readonly ChatMessage[] {
    return this.store.list();
  }

  snapshot(): SessionState {
    return {
      id: this.id,
      persona: this.personaValue.name,
      busy: this.busy,
      ...this.store.snapshot(),
    };
  }

  private append(hooks: ChatSessionHooks, message: ChatMessage): ChatMessage {
    const stored = this.store.append(message);
    hooks.onMessageAppended?.(stored);
    return stored;
  }

  private async generateTextReply(persona: Persona, userMessage: ChatMessage): Promise<ChatMessage> {
    const request = assembleModelRequest({
      persona,
      history: this.store.list(),
      userMessage,
    });
    const result = await this.options.gateway.generateText(request);
    return {
      role: "assistant",
      content: result.ok ? result.value : describeTextFault(result.fault),
    };
  }

  private async generateImageReply(prompt: string): Promise<ChatMessage> {
    const result = await this.options.gateway.generateImage(prompt);
    if (result.ok) {
      return { role: "assistant", generatedImage: result.value };
    }
    return { role: "assistant", content: describeImageFault(result.fault) };
  }
}
