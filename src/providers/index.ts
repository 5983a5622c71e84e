export { OpenAIUpstream } from './openai.js';
export type { OpenAIUpstreamConfig } from './openai.js';
