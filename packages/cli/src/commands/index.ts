export { createSearchCommand, handleSearch } from './search.js';
export { createServeCommand, handleServe, waitForSignal } from './serve.js';
export { buildValidationReport, createValidateCommand, handleValidate } from './validate.js';
export type { CommandContext, RunState } from './context.js';
