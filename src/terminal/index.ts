export type { PassphrasePrompter } from './types.js';
export { createStaticPrompter, createTerminalPrompter } from './prompter.js';
export type { StaticPrompterOptions, TerminalPrompterOptions } from './prompter.js';
