/**
 * Provider-neutral chat types. Structurally compatible with the OpenAI
 * chat completions request shapes.
 */

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] };

/**
 * JSON Schema handed to the provider as a structured-output contract.
 */
export interface ResponseSchema {
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

export interface ModelRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  responseSchema?: ResponseSchema;
}

export interface ModelCompletion {
  content: string | null;
  model: string;
  requestId: string;
}

/**
 * The remote language/vision model. Implementations may throw on any
 * transport or provider failure.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelCompletion>;
}
