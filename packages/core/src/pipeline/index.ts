export { type LLMCallRequest, runLLMCall } from './run-call.js';
