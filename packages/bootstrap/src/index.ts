export { bootstrapDemonstrations, defaultMetric } from './engine.js';
export {
  renderIssues,
  renderDemonstrations,
  renderSkill,
  buildPrompt,
  promptFingerprint,
  createPromptModule,
} from './prompt.js';
export { splitCorpus } from './split.js';

export type {
  Metric,
  BootstrapOptions,
  BootstrapCandidate,
  BootstrapFailure,
  BootstrapResult,
  PromptModuleInput,
  CorpusSplit,
} from './types.js';
