export { createTerminalPrompter } from './prompter.js';
export type { Prompter } from './prompter.js';
export { askConfirm, askDatasetPath, askBatchSize } from './questions.js';
