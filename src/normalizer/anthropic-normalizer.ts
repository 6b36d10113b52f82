import Anthropic from "@anthropic-ai/sdk";

import type { TextNormalizer } from "../core/types.js";

const SYSTEM_PROMPT = [
  "This is a filename, please clean it up. Your output should be in the format of [title] [author name].",
  "Remove any punctuation and symbols except for periods, replace any double spaces with a single space,",
  "and remove any words that are not part of the title or the author's name. Answer with the cleaned text only.",
  "Examples:",
  '"The Lighthouse Keeper (Special Edition, 2019) - MORROW, ELLEN.epub" becomes "The Lighthouse Keeper Ellen Morrow".',
  '"Quiet Orchard, The - Sam Ridley.epub" becomes "The Quiet Orchard Sam Ridley".',
].join(" ");

/** Minimal view of a reply content block. */
export interface ReplyBlock {
  type: string;
  text?: string;
}

/** Build the `messages.create` parameters for one filename. */
export function buildNormalizationRequest(
  fileName: string,
  model: string,
  maxTokens: number,
) {
  return {
    model,
    max_tokens: maxTokens,
    temperature: 0,
    system: SYSTEM_PROMPT,
    messages: [{ role: "user" as const, content: `Filename: ${fileName}` }],
  };
}

/** Concatenate the text blocks of a reply, trimmed. */
export function readReplyText(content: readonly ReplyBlock[]): string {
  return content
    .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
    .join("")
    .trim();
}

export interface AnthropicNormalizerOptions {
  model: string;
  maxTokens: number;
}

/** {@link TextNormalizer} backed by a Claude model. One call per filename, no retries. */
export class AnthropicTextNormalizer implements TextNormalizer {
  constructor(
    private readonly client: Anthropic,
    private readonly options: AnthropicNormalizerOptions,
  ) {}

  async normalize(fileName: string): Promise<string> {
    const response = await this.client.messages.create(
      buildNormalizationRequest(
        fileName,
        this.options.model,
        this.options.maxTokens,
      ),
    );
    return readReplyText(response.content);
  }
}

/** Create a client with the SDK's own retries turned off. */
export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 });
}
