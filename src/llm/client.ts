import OpenAI from "openai";
import { CommandSchema } from "../commands/schema";
import { LanguageModel, ModelCallOptions, ModelRequest } from "../types";
import { UpstreamServiceError, errorMessage } from "../utils/errors";
import { Env } from "../utils/env";
import { Logger } from "../utils/logger";
import { buildSystemPrompt, buildUserMessage } from "./prompt";

/** OpenAI-compatible chat client; also works against local runners via OPENAI_BASE_URL. */
export class LlmClient implements LanguageModel {
  private openai: OpenAI;
  private model: string;
  private logger: Logger;
  private systemPrompt: string;

  constructor(env: Env, schema: CommandSchema, logger: Logger) {
    this.model = env.OPENAI_MODEL;
    this.logger = logger;
    this.openai = new OpenAI({ apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL, maxRetries: 0 });
    this.systemPrompt = buildSystemPrompt(schema);
  }

  async generate(request: ModelRequest, options: ModelCallOptions): Promise<string> {
    const userContent = buildUserMessage(request.user_input, request.retry_context);
    this.logger.debug("LLM request", {
      correlationId: options.correlationId,
      model: this.model,
      retry: Boolean(request.retry_context),
    });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: this.systemPrompt },
            { role: "user", content: userContent },
          ],
          max_tokens: 512,
          temperature: 0.1,
          response_format: { type: "json_object" },
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw new UpstreamServiceError("language-model", `Language model request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const text = (completion.choices[0]?.message?.content ?? "").trim();
    if (!text) {
      throw new UpstreamServiceError("language-model", "Language model returned an empty reply");
    }
    this.logger.debug("LLM response", { correlationId: options.correlationId, length: text.length });
    return text;
  }
}
