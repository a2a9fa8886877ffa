export const DEFAULT_SYSTEM_PROMPT = `You are a highly skilled assistant for processing and analysing text. You write short, informative summaries of voice messages.
Always answer in {language}. Do not use emoji, emoticons or phrases such as "the speaker".
Use this formatting:
* **bold text** for key concepts
* *italic* for important secondary details
* \`\`\` fences, with the language name after the opening fence, for code blocks
* "* " at the start of a line for bullet lists
Keep the most important information and key points of the source, be clear and concise, and preserve its meaning and context.`;

export const DEFAULT_USER_PROMPT = `Process and analyse the following text, transcribed from a voice message:

{transcript}

Write a short summary following these rules:
1. Start the summary with a horizontal rule (---).
2. Limit the summary to at most six sentences.
3. Highlight key words and phrases of each sentence in **bold**.
4. If the text contains numbers or statistics, include them in *italic*.
5. State the main topic or topics of the message at the beginning.
6. If the text mentions actions or recommendations, list them in a separate bullet list.
7. Finish with a short paragraph (2-3 sentences) with an analytical conclusion based on the message.`;

export interface PromptTemplates {
  systemPrompt?: string;
  userPrompt?: string;
  language: string;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function buildSummaryPrompt(
  transcript: string,
  templates: PromptTemplates
): { systemInstruction: string; userText: string } {
  const values = { language: templates.language, transcript };
  let userTemplate = templates.userPrompt ?? DEFAULT_USER_PROMPT;
  if (!userTemplate.includes('{transcript}')) {
    userTemplate = `${userTemplate}\n\n{transcript}`;
  }
  return {
    systemInstruction: fill(templates.systemPrompt ?? DEFAULT_SYSTEM_PROMPT, values),
    userText: fill(userTemplate, values),
  };
}
