export { OpenAIJobClient, createOpenAIJobClient } from './OpenAIJobClient.js';
export type { BatchApi, OpenAIJobClientOptions, OpenAIConnectionOptions } from './OpenAIJobClient.js';
