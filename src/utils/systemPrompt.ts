const SYSTEM_PROMPT = `You are a careful memoir writer. You turn interview answers into honest first-person life-story prose and never invent facts.`;

// Shared by every provider; the style guide is appended when there is one
export const buildSystemPrompt = (styleGuide: string): string =>
    styleGuide.trim() ? `${SYSTEM_PROMPT}\n\nStyle guide:\n${styleGuide}` : SYSTEM_PROMPT;
