// Orchestrator Module - Main exports

export { AgentLoop, parseToolArguments, splitIntoFragments, MAX_TOOL_CONTENT_LENGTH, type AgentLoopDeps } from './agent-loop.js';
export { buildSystemPrompt } from './prompts.js';
export { TurnState } from './types.js';
export type { AgentLoopOptions, LoopState, TurnResult } from './types.js';
