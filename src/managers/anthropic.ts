import { Anthropic } from "@anthropic-ai/sdk";
import { Config } from "../types/config.js";
import { RecipeInput, RecipeReader } from "../utils/extract.js";

const RECIPE_FORMAT = `{"title": "Recipe Title", "ingredients": ["ingredient 1", "ingredient 2"], "steps": ["First step", "Second step"]}`;

export const IMAGE_PROMPT = `Extract the recipe from this image and output ONLY valid JSON with no extra text or explanation. Format: ${RECIPE_FORMAT}. Read all text carefully, including handwriting, and keep ingredients and steps in the order they appear.`;

export function textPrompt(text: string): string {
  return `Extract the recipe from this text and output ONLY a JSON object with this exact format, no extra text, no markdown:\n\n${RECIPE_FORMAT}\n\nRecipe text to extract from:\n${text}`;
}

function buildContent(input: RecipeInput): Anthropic.MessageParam["content"] {
  if (input.kind === "text") return textPrompt(input.text);
  return [
    {
      type: "image",
      source: {
        type: "base64",
        media_type: input.mediaType,
        data: input.data.toString("base64"),
      },
    },
    { type: "text", text: IMAGE_PROMPT },
  ];
}

/**
 * Reads recipes with Claude: vision for photos, plain text for pasted
 * recipes. Returns the reply untouched; parsing happens downstream.
 */
export class AnthropicRecipeReader implements RecipeReader {
  private client: Anthropic;

  constructor(private config: Config["ai"]) {
    if (!config.anthropicKey) {
      throw new Error(
        'Anthropic API key required. Run "potluck init" or set ANTHROPIC_API_KEY.'
      );
    }
    // Retries and timeouts are handled by extractRecipe.
    this.client = new Anthropic({ apiKey: config.anthropicKey, maxRetries: 0 });
  }

  async read(input: RecipeInput, signal: AbortSignal): Promise<string> {
    const message = await this.client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        messages: [{ role: "user", content: buildContent(input) }],
      },
      { signal, timeout: this.config.timeoutMs }
    );

    return message.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("\n");
  }
}
