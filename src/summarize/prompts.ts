export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

const SYSTEM_PROMPT = "You are a professional writer.";

const RULES = [
  "- Keep the important points and state them concisely.",
  "- Cut redundant expressions.",
  "- Do not invent content that is not in the source text.",
  "- Write in the same language as the source text.",
  "- Text such as [[transcription gap: chunk 002]] marks audio that could not be transcribed; do not guess what it contained.",
].join("\n");

export function buildSummaryPrompt(input: {
  transcript: string;
  targetChars: number;
  part?: { index: number; total: number };
}): PromptBundle {
  const task = input.part
    ? `The transcript below is part ${input.part.index + 1} of ${input.part.total} of one recording. ` +
      `Summarize only this part in about ${input.targetChars} characters.`
    : `Based on the content of the audio transcript below, write an introductory magazine article of about ${input.targetChars} characters.`;

  const rules = input.part
    ? RULES
    : `${RULES}\n- Start with a catchy title that makes people want to read on.`;

  const userPrompt = [
    task,
    "",
    "--- Transcript ---",
    input.transcript,
    "",
    "--- Rules ---",
    rules,
  ].join("\n");

  return { systemPrompt: SYSTEM_PROMPT, userPrompt };
}

export function buildReducePrompt(input: { partials: string[]; targetChars: number }): PromptBundle {
  const sections = input.partials.map((text, index) => `### Part ${index + 1}\n${text}`);

  const userPrompt = [
    `The sections below summarize consecutive parts of one recording, in order. ` +
      `Merge them into a single introductory magazine article of about ${input.targetChars} characters.`,
    "",
    "--- Part summaries ---",
    sections.join("\n\n"),
    "",
    "--- Rules ---",
    `${RULES}\n- Start with a catchy title that makes people want to read on.`,
  ].join("\n");

  return { systemPrompt: SYSTEM_PROMPT, userPrompt };
}
