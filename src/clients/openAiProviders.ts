import { OpenAIEmbeddings } from "@langchain/openai";
import OpenAI from "openai";

import type {
  EmbeddingProvider,
  GenerationProvider,
  PromptMessage,
} from "../types/providerTypes";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly embeddings: OpenAIEmbeddings;

  constructor(apiKey: string | undefined, readonly modelId: string) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY missing in environment; cannot create embeddings");
    }
    this.embeddings = new OpenAIEmbeddings({ apiKey, model: modelId });
  }

  embedQuery(text: string): Promise<number[]> {
    return this.embeddings.embedQuery(text);
  }

  embedDocuments(texts: string[]): Promise<number[][]> {
    return this.embeddings.embedDocuments(texts);
  }
}

const toOpenAIMessage = (
  m: PromptMessage
): OpenAI.Chat.ChatCompletionMessageParam => {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    case "user":
      return { role: "user", content: m.content };
  }
};

export class OpenAIGenerationProvider implements GenerationProvider {
  private readonly client: OpenAI;

  constructor(
    apiKey: string | undefined,
    readonly modelId: string,
    private readonly maxTokens: number
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async *generate(
    messages: PromptMessage[],
    options: { signal?: AbortSignal } = {}
  ): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.modelId,
        messages: messages.map(toOpenAIMessage),
        max_tokens: this.maxTokens,
        stream: true,
      },
      { signal: options.signal }
    );

    for await (const part of stream) {
      const token = part.choices[0]?.delta?.content;
      if (token) yield token;
    }
  }
}
