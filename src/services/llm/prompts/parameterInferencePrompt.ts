export const PARAMETER_INFERENCE_PROMPT_TEMPLATE = `
Infer one parameter value for an integration action from the user's request.

Request:
"{{RAW_TEXT}}"

Action: {{ACTION_ID}}
Parameter: {{PARAMETER_NAME}} ({{PARAMETER_TYPE}})
Description: {{PARAMETER_DESCRIPTION}}
Constraints: {{PARAMETER_CONSTRAINTS}}
{{REJECTED_SECTION}}
Respond with a single JSON object: { "value": <the value, or null if the request does not contain it> }
Only use information present in the request.
`;
