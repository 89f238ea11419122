import type {
  GenerateContentParameters,
  GenerateImagesParameters,
  Part,
} from "@google/genai";
import { GoogleGenAI } from "@google/genai";
import type {
  GatewayFault,
  GatewayResult,
  ImagePayload,
  ModelGateway,
  ModelRequest,
} from "./chat-types.js";

// Structural slice of the SDK client so tests can hand in a stub.
export type GenAiClient = {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
    generateImages(params: GenerateImagesParameters): Promise<{
      generatedImages?: Array<{
        image?: {
          imageBytes?: string;
          mimeType?: string;
        };
      }>;
    }>;
  };
};

export type GeminiGatewayOptions = {
  client: GenAiClient;
  textModel: string;
  imageModel: string;
  log?: (message: string) => void;
};

export function createGenAiClient(apiKey: string): GenAiClient {
  return new GoogleGenAI({ apiKey });
}

export class GeminiGateway implements ModelGateway {
  constructor(private readonly options: GeminiGatewayOptions) {}

  async generateText(request: ModelRequest): Promise<GatewayResult<string>> {
    const contents: Part[] = request.parts.map((part) =>
      part.kind === "image"
        ? {
            inlineData: {
              mimeType: part.image.mimeType,
              data: Buffer.from(part.image.data).toString("base64"),
            },
          }
        : { text: part.text },
    );

    try {
      const response = await this.options.client.models.generateContent({
        model: this.options.textModel,
        contents,
      });
      const text = response.text;
      if (typeof text !== "string") {
        return this.fail("text", "model returned no text");
      }
      return { ok: true, value: text };
    } catch (error) {
      return this.fail("text", describeError(error));
    }
  }

  async generateImage(prompt: string): Promise<GatewayResult<ImagePayload>> {
    try {
      const response = await this.options.client.models.generateImages({
        model: this.options.imageModel,
        prompt,
        config: {
          numberOfImages: 1,
          outputMimeType: "image/png",
        },
      });
      const image = response.generatedImages?.[0]?.image;
      const imageBytes = image?.imageBytes?.trim();
      if (!imageBytes) {
        return this.fail("image", "model returned no image");
      }
      return {
        ok: true,
        value: {
          mimeType: image?.mimeType?.trim() || "image/png",
          data: Buffer.from(imageBytes, "base64"),
        },
      };
    } catch (error) {
      return this.fail("image", describeError(error));
    }
  }

  private fail(operation: "text" | "image", cause: string): { ok: false; fault: GatewayFault } {
    this.options.log?.(`${operation} generation failed: ${cause}`);
    return { ok: false, fault: { cause } };
  }
}

export function describeTextFault(fault: GatewayFault): string {
  return `Sorry, an error occurred: ${fault.cause}`;
}

export function describeImageFault(fault: GatewayFault): string {
  return `Sorry, image generation failed: ${fault.cause}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
