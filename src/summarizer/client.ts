import Anthropic from "@anthropic-ai/sdk";

export interface CompletionRequest {
  model: string;
  max_tokens: number;
  system?: string;
  messages: Array<{ role: "user"; content: string }>;
}

export interface CompletionResponse {
  content: Array<{ type: string; text?: string }>;
}

/** The slice of the Anthropic client the digest talks to. */
export interface CompletionClient {
  messages: {
    create(request: CompletionRequest): Promise<CompletionResponse>;
  };
}

export function createCompletionClient(
  apiKey: string | undefined = process.env.ANTHROPIC_API_KEY
): CompletionClient | undefined {
  if (!apiKey) return undefined;
  return new Anthropic({ apiKey });
}

export function responseText(response: CompletionResponse): string {
  const first = response.content[0];
  return first?.type === "text" && first.text ? first.text : "";
}
