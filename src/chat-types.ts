export type ChatRole = "user" | "assistant";

export type ImagePayload = {
  mimeType: string;
  data: Uint8Array;
  name?: string;
};

export type ChatMessage = {
  role: ChatRole;
  content?: string;
  image?: ImagePayload;
  generatedImage?: ImagePayload;
};

export type UploadedFile = {
  name: string;
  data: Uint8Array;
};

export type PersonaKind = "text" | "image";

export type Persona = {
  name: string;
  kind: PersonaKind;
  instruction: string;
};

export type ModelRequestPart =
  | {
      kind: "image";
      image: ImagePayload;
    }
  | {
      kind: "text";
      text: string;
    };

export type ModelRequest = {
  parts: ModelRequestPart[];
};

export type GatewayFault = {
  cause: string;
};

export type GatewayResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      fault: GatewayFault;
    };

export interface ModelGateway {
  generateText(request: ModelRequest): Promise<GatewayResult<string>>;
  generateImage(prompt: string): Promise<GatewayResult<ImagePayload>>;
}
