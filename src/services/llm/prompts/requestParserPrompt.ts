export const REQUEST_PARSER_PROMPT_TEMPLATE = `
You extract structured hints from a user's request to run an integration action.

Request:
"{{RAW_TEXT}}"

Known platforms (use one of these exactly, or null):
{{KNOWN_PLATFORMS}}

Context variables the user can reference (name: type):
{{CONTEXT_VARIABLES}}

Respond with a single JSON object and nothing else:
{
  "platform": string | null,
  "operation": string | null,
  "entityType": string | null,
  "literalParams": { "<parameter name>": string | number | boolean },
  "ambiguityFlags": string[]
}

Rules:
- "platform" must be null unless the request names or clearly implies one of the known platforms. Never guess.
- "operation" is the verb the user wants performed (e.g. "send", "create", "update"), lowercase.
- "entityType" is the kind of object acted on (e.g. "message", "lead", "page"), lowercase singular.
- "literalParams" holds only values spelled out in the request text. Do not invent values.
- Add a short flag to "ambiguityFlags" for anything you could not decide.
`;
