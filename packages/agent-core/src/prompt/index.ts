export { PromptBuilder, responseFormat, renderInstalledTools, SUBMIT_COMMAND, type PromptInput } from './prompt-builder.js';
