import type {
  ChatMessage,
  ModelRequest,
  ModelRequestPart,
  Persona,
  UploadedFile,
} from "../chat-types.js";
import { extractText } from "./extract.js";
import { classifyUpload, imagePayloadFromUpload } from "./uploads.js";

/** Speech-to-text collaborator. Only a placeholder ships today. */
export interface AudioTranscriber {
  transcribe(file: UploadedFile, prompt: string): Promise<string>;
}

export const placeholderAudioTranscriber: AudioTranscriber = {
  async transcribe(file, prompt) {
    return `Audio file '${file.name}' was uploaded. The user's prompt is: ${prompt}`;
  },
};

export function foldFileContext(fileName: string, extractedText: string, prompt: string): string {
  return `Context from file '${fileName}':\n---\n${extractedText}\n---\nUser's question: ${prompt}`;
}

export async function buildUserMessage(params: {
  persona: Persona;
  prompt: string;
  upload?: UploadedFile;
  transcriber?: AudioTranscriber;
}): Promise<ChatMessage> {
  const { persona, prompt, upload } = params;

  // image generation takes the raw prompt and nothing else
  if (!upload || persona.kind === "image") {
    return { role: "user", content: prompt };
  }

  switch (classifyUpload(upload.name)) {
    case "image":
      return {
        role: "user",
        content: prompt,
        image: imagePayloadFromUpload(upload),
      };
    case "audio": {
      const transcriber = params.transcriber ?? placeholderAudioTranscriber;
      return {
        role: "user",
        content: await transcriber.transcribe(upload, prompt),
      };
    }
    case "document":
      return {
        role: "user",
        content: foldFileContext(upload.name, await extractText(upload), prompt),
      };
  }
}

export function buildPromptText(persona: Persona, history: readonly ChatMessage[]): string {
  const lines = [persona.instruction];
  for (const message of history) {
    if (message.content) {
      lines.push(`${message.role}: ${message.content}`);
    }
  }
  return lines.join("\n");
}

/**
 * Flattens persona and history into the outbound request. `history` already
 * ends with `userMessage`; only that turn's uploaded image rides along.
 */
export function assembleModelRequest(params: {
  persona: Persona;
  history: readonly ChatMessage[];
  userMessage: ChatMessage;
}): ModelRequest {
  const parts: ModelRequestPart[] = [];
  if (params.userMessage.image) {
    parts.push({ kind: "image", image: params.userMessage.image });
  }
  parts.push({ kind: "text", text: buildPromptText(params.persona, params.history) });
  return { parts };
}
