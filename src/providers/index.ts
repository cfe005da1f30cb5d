export { AdvisoryClient, parseAdvisoryDecision, parseFindingScore } from './advisory.js';
export type {
  AdvisoryService,
  AdvisoryDecision,
  AdvisoryFindingScore,
  AdvisoryClientOptions,
  AskOptions,
  ValidationRequest,
} from './advisory.js';
export { getExecutor, MockExecutor, OpenAiCompatibleExecutor, isMockLlmEnabled } from './executors/index.js';
export type { PromptExecutor, PromptOptions, PromptResult } from './executor.js';
