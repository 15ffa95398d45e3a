export { optimizeSkill } from './engine.js';
export type { OptimizeInput, OptimizationResult, StageName, StageResult } from './types.js';
