import { randomUUID } from "node:crypto";
import type { ChatMessage, ImagePayload, ModelGateway, Persona, UploadedFile } from "../chat-types.js";
import type { AppConfig } from "../config.js";
import { GeminiGateway, createGenAiClient } from "../gemini.js";
import type { AudioTranscriber } from "./context.js";
import { detectDocumentFormat, extractText, type DocumentFormat } from "./extract.js";
import { getPersona, listPersonas } from "./personas.js";
import { ChatSession, type TurnResult } from "./session.js";
import { loadUpload, toDataUrl, type RuntimeUploadInput } from "./uploads.js";

export type SerializedImage = {
  mime_type: string;
  name?: string;
  data_url: string;
};

export type SerializedMessage = {
  role: ChatMessage["role"];
  content?: string;
  image?: SerializedImage;
  generated_image?: SerializedImage;
};

export type SerializedSessionState = {
  session_id: string;
  persona: string;
  busy: boolean;
  pending_clear: boolean;
  messages: SerializedMessage[];
};

export type RuntimeEvent =
  | { type: "session.created"; payload: { session_id: string; persona: string } }
  | { type: "turn.started"; payload: { session_id: string; turn_id: string; persona: string } }
  | { type: "message.appended"; payload: { session_id: string; turn_id: string; message: SerializedMessage } }
  | { type: "turn.completed"; payload: { session_id: string; turn_id: string } }
  | { type: "turn.failed"; payload: { session_id: string; turn_id: string; error: string } }
  | { type: "history.clear_requested"; payload: { session_id: string } }
  | { type: "history.cleared"; payload: { session_id: string; cleared_count: number } }
  | { type: "history.clear_cancelled"; payload: { session_id: string } }
  | { type: "runtime.shutdown"; payload: { reason: string } };

export type RuntimeEventListener = (event: RuntimeEvent) => void;

/** Caller sent something the runtime cannot act on (bad persona, bad upload). */
export class RuntimeInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuntimeInputError";
  }
}

export class UnknownSessionError extends Error {
  constructor(sessionId: string) {
    super(`unknown session: ${sessionId}`);
    this.name = "UnknownSessionError";
  }
}

export type ChatCoreRuntimeOptions = {
  config: AppConfig;
  gateway: ModelGateway;
  transcriber?: AudioTranscriber;
  log?: (message: string) => void;
  createId?: () => string;
};

export class ChatCoreRuntime {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly listeners = new Set<RuntimeEventListener>();
  private readonly createId: () => string;
  private shuttingDown = false;

  constructor(private readonly options: ChatCoreRuntimeOptions) {
    this.createId = options.createId ?? randomUUID;
  }

  static create(config: AppConfig, log?: (message: string) => void): ChatCoreRuntime {
    const gateway = new GeminiGateway({
      client: createGenAiClient(config.apiKey),
      textModel: config.textModel,
      imageModel: config.imageModel,
      log,
    });
    return new ChatCoreRuntime({ config, gateway, log });
  }

  onEvent(listener: RuntimeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getState() {
    return {
      ok: true as const,
      session_count: this.sessions.size,
      text_model: this.options.config.textModel,
      image_model: this.options.config.imageModel,
      default_persona: this.options.config.defaultPersona,
      shutting_down: this.shuttingDown,
    };
  }

  listPersonas() {
    return {
      default_persona: this.options.config.defaultPersona,
      personas: listPersonas().map((persona) => ({
        name: persona.name,
        kind: persona.kind,
        instruction: persona.instruction,
      })),
    };
  }

  createSession(params: { persona?: string } = {}) {
    const persona = this.resolvePersona(params.persona ?? this.options.config.defaultPersona);
    const sessionId = this.createId();
    const session = new ChatSession({
      id: sessionId,
      persona,
      gateway: this.options.gateway,
      transcriber: this.options.transcriber,
    });
    this.sessions.set(sessionId, session);
    this.options.log?.(`session ${sessionId} created with persona "${persona.name}"`);
    this.emit({ type: "session.created", payload: { session_id: sessionId, persona: persona.name } });
    return {
      session_id: sessionId,
      state: serializeSession(session),
    };
  }

  getSession(sessionId: string): SerializedSessionState {
    return serializeSession(this.requireSession(sessionId));
  }

  setSessionPersona(sessionId: string, personaName: string) {
    const session = this.requireSession(sessionId);
    const persona = this.resolvePersona(personaName);
    session.setPersona(persona);
    return {
      session_id: sessionId,
      persona: persona.name,
    };
  }

  async sendSessionPrompt(sessionId: string, params: { prompt: string; upload?: RuntimeUploadInput }) {
    const session = this.requireSession(sessionId);
    if (this.shuttingDown) {
      throw new RuntimeInputError("runtime is shutting down");
    }

    let upload: UploadedFile | undefined;
    if (params.upload) {
      const loaded = loadUpload(params.upload, this.options.config.maxUploadBytes);
      if (!loaded.ok) {
        throw new RuntimeInputError(loaded.error);
      }
      upload = loaded.file;
    }

    const turnId = this.createId();
    const onMessage = (message: ChatMessage) => {
      this.emit({
        type: "message.appended",
        payload: { session_id: sessionId, turn_id: turnId, message: serializeMessage(message) },
      });
    };

    let started = false;
    let result: TurnResult;
    try {
      result = await session.runTurn({ prompt: params.prompt, upload }, {
        onTurnStarted: (persona) => {
          started = true;
          this.emit({ type: "turn.started", payload: { session_id: sessionId, turn_id: turnId, persona: persona.name } });
        },
        onMessageAppended: onMessage,
      });
    } catch (error) {
      // every turn.started is closed by turn.completed or turn.failed
      if (started) {
        const message = error instanceof Error ? error.message : String(error);
        this.options.log?.(`turn ${turnId} failed: ${message}`);
        this.emit({ type: "turn.failed", payload: { session_id: sessionId, turn_id: turnId, error: message } });
      }
      throw error;
    }

    this.emit({ type: "turn.completed", payload: { session_id: sessionId, turn_id: turnId } });
    return {
      session_id: sessionId,
      turn_id: turnId,
      user_message: serializeMessage(result.userMessage),
      assistant_message: serializeMessage(result.assistantMessage),
    };
  }

  historyClearRequest(sessionId: string) {
    this.requireSession(sessionId).requestClear();
    this.emit({ type: "history.clear_requested", payload: { session_id: sessionId } });
    return { session_id: sessionId, pending_clear: true };
  }

  historyClearConfirm(sessionId: string) {
    const session = this.requireSession(sessionId);
    const pending = session.snapshot().pendingClear;
    const clearedCount = session.confirmClear();
    if (pending) {
      this.emit({ type: "history.cleared", payload: { session_id: sessionId, cleared_count: clearedCount } });
    }
    return { session_id: sessionId, cleared: pending, cleared_count: clearedCount };
  }

  historyClearCancel(sessionId: string) {
    this.requireSession(sessionId).cancelClear();
    this.emit({ type: "history.clear_cancelled", payload: { session_id: sessionId } });
    return { session_id: sessionId, pending_clear: false };
  }

  async extractFile(input: RuntimeUploadInput) {
    const loaded = loadUpload(input, this.options.config.maxUploadBytes);
    if (!loaded.ok) {
      throw new RuntimeInputError(loaded.error);
    }
    const format: DocumentFormat | null = detectDocumentFormat(loaded.file.name);
    return {
      name: loaded.file.name,
      format,
      text: await extractText(loaded.file),
    };
  }

  async shutdown(reason = "requested") {
    if (!this.shuttingDown) {
      this.shuttingDown = true;
      this.options.log?.(`shutting down (${reason})`);
      this.emit({ type: "runtime.shutdown", payload: { reason } });
    }
    return { accepted: true as const, reason };
  }

  private requireSession(sessionId: string): ChatSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UnknownSessionError(sessionId);
    }
    return session;
  }

  private resolvePersona(name: string): Persona {
    const persona = getPersona(name);
    if (!persona) {
      throw new RuntimeInputError(`unknown persona: ${name}`);
    }
    return persona;
  }

  private emit(event: RuntimeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.options.log?.(`event listener failed on ${event.type}: ${message}`);
      }
    }
  }
}

export function serializeMessage(message: ChatMessage): SerializedMessage {
  const row: SerializedMessage = { role: message.role };
  if (message.content !== undefined) {
    row.content = message.content;
  }
  if (message.image) {
    row.image = serializeImage(message.image);
  }
  if (message.generatedImage) {
    row.generated_image = serializeImage(message.generatedImage);
  }
  return row;
}

function serializeImage(image: ImagePayload): SerializedImage {
  const row: SerializedImage = {
    mime_type: image.mimeType,
    data_url: toDataUrl(image),
  };
  if (image.name) {
    row.name = image.name;
  }
  return row;
}

function serializeSession(session: ChatSession): SerializedSessionState {
  const state = session.snapshot();
  return {
    session_id: state.id,
    persona: state.persona,
    busy: state.busy,
    pending_clear: state.pendingClear,
    messages: state.messages.map(serializeMessage),
  };
}
