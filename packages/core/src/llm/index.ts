/**
 * LLM module barrel export.
 */

export type { ChatMessage, ChatRole, CompletionOptions, LanguageModel, LlmSqlPlan, ParamType } from './types.js';
export { OpenAIModel } from './openai.js';
export type { OpenAIModelOptions } from './openai.js';
export { estimateTokens, scoreMatch, selectSchemaContext, tokenize } from './schema.js';
export type { SchemaSelection } from './schema.js';
export { PromptBuilder, buildMessages, buildRepairMessages } from './prompt.js';
export type { HistoryTurn, Intent, Prompt, PromptBuilderOptions, PromptInput } from './prompt.js';
export { SqlCompiler, extractPlan, interpretResponse } from './compiler.js';
export type { CompileOptions } from './compiler.js';
export { llmSqlPlanSchema } from './schema_json.js';
