export { create, createAutoAccept, createReadlineReader, parseAnswer, CHOICES_HINT } from './prompt';
export type { PromptOptions, ReadlineReaderOptions } from './prompt';
export * from './types';
