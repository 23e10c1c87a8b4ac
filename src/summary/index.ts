export { create, buildMessages, parseSummary, SYSTEM_PROMPT } from './service';
export type { ChatClient } from './service';
export * from './types';
