export { createGeminiGenerator, DEFAULT_GEMINI_MODEL } from './gemini.js';
export { createOpenAIGenerator, DEFAULT_OPENAI_MODEL } from './openai.js';
export { createAnthropicGenerator, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
