import { RecipeInput, RecipeReader } from "../utils/extract.js";

export const SOUP_REPLY =
  "Grandma's Soup\nIngredients:\n- 2 carrots\n- 1 onion\nSteps:\n1. Chop vegetables\n2. Simmer 20 minutes";

type Reply = string | Error | ((input: RecipeInput, signal: AbortSignal) => Promise<string>);

/**
 * In-process stand-in for the model. Replies are handed out in order; the
 * last one repeats.
 */
export class FakeRecipeReader implements RecipeReader {
  readonly calls: RecipeInput[] = [];

  constructor(private replies: Reply[]) {}

  async read(input: RecipeInput, signal: AbortSignal): Promise<string> {
    this.calls.push(input);
    const reply =
      this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(input, signal);
    return reply;
  }
}

export function hangingReply(_input: RecipeInput, signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason));
  });
}
