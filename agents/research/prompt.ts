// Prompts and fixed user-facing messages for single-shot research

export const wordBudget = (maxTokens: number): number => Math.floor(maxTokens / 2);

export const PROMPT_CONCISE = (query: string, maxTokens: number) =>
  `Answer this concisely in ${wordBudget(maxTokens)} words or less. ` +
  `Be direct and factual. No preamble or conclusion.\n\n` +
  `Question: ${query}`;

export const QUOTA_EXCEEDED_MESSAGE = (details: string) => `❌ **API Quota Exceeded**

You've hit your Google API rate limit. This usually means:

1. **Free tier quota exhausted** - Check your usage at https://aistudio.google.com/
2. **Too many requests** - Wait a few minutes and try again
3. **Daily limit reached** - Quota resets daily

💡 **Solutions:**
- Wait 1-2 minutes before trying again
- Use lower token limits (128-256) to conserve quota
- Consider enabling billing for higher limits

📋 **Error details:** ${details}`;

export const RESEARCH_ERROR_MESSAGE = (details: string) => `❌ **Error during research:**

${details}

Please check your API key and try again.`;

export const RESEARCH_CAPABILITIES = [
  'Text generation',
  'Research queries',
  'Information synthesis'
] as const;
