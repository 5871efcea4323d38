import { CommandSchema, FieldSpec, describeRange } from "../commands/schema";

function describeField(name: string, spec: FieldSpec): string {
  const parts = [`${name}: ${spec.description}`];
  switch (spec.type) {
    case "number": {
      const range = describeRange(spec);
      parts.push(spec.integer ? "integer" : "number");
      if (range) parts.push(range);
      break;
    }
    case "enum":
      parts.push(`one of ${spec.values.join(", ")}`);
      break;
    case "text":
      parts.push("non-empty text");
      if (spec.suggestions?.length) parts.push(`known values: ${spec.suggestions.join(", ")}`);
      break;
  }
  if (spec.default !== undefined) parts.push(`default ${spec.default}`);
  return `    - ${parts.join("; ")}`;
}

/** System prompt listing every command the schema knows, so the two never drift apart. */
export function buildSystemPrompt(schema: CommandSchema): string {
  const catalog = schema
    .list()
    .map((spec) => {
      const fields = Object.entries(spec.fields).map(([name, field]) => describeField(name, field));
      const example = JSON.stringify({ response: "...", command: spec.name, command_params: spec.example.params });
      return [
        `- ${spec.name}: ${spec.description}`,
        ...fields,
        `    e.g. "${spec.example.utterance}" -> ${example}`,
      ].join("\n");
    })
    .join("\n");

  return `You are the voice interface of a home patrol robot. Reply with a single JSON object and nothing else:
{"response": "<short spoken reply>", "command": "<command name or null>", "command_params": {<parameters> or null}}

Commands:
${catalog}

Rules:
- Write every number with digits (5, not "five").
- Use command null and command_params null for greetings, questions and small talk.
- Use command null and explain politely when the request is beyond these commands.
- If the message includes "Previous error", fix exactly those problems and answer again.`;
}

export function buildUserMessage(userInput: string, retryContext?: string): string {
  return retryContext ? `${userInput}\n\nPrevious error: ${retryContext}` : userInput;
}
