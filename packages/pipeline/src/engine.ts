import type { RunConfig, TrainingExample } from '@skillbench/core';
import { ConfigurationError, loadCorpus, resolveConfig, silentLogger } from '@skillbench/core';
import { bootstrapDemonstrations, createPromptModule, renderSkill, splitCorpus } from '@skillbench/bootstrap';
import type { CorpusSplit } from '@skillbench/bootstrap';
import { compareRuns, evaluateModule } from '@skillbench/runner';
import type { OptimizationResult, OptimizeInput, StageName, StageResult } from './types.js';

const STAGES: readonly StageName[] = ['split', 'baseline', 'bootstrap', 'candidate', 'compare'];

async function resolveSets(input: OptimizeInput, config: RunConfig): Promise<CorpusSplit> {
  if (input.trainset && input.valset) {
    return { trainset: input.trainset, valset: input.valset };
  }
  if (input.corpus === undefined) {
    throw new ConfigurationError('Either a corpus or both trainset and valset are required', [
      { path: 'corpus', message: 'required when trainset/valset are not given' },
    ]);
  }
  const examples: readonly TrainingExample[] =
    typeof input.corpus === 'string' ? await loadCorpus(input.corpus) : input.corpus;
  return splitCorpus(examples, config.trainRatio, config.seed);
}

/**
 * Bootstraps demonstrations for a skill and measures whether they help:
 * the bare skill and the skill with demonstrations are both evaluated on
 * the validation set and compared.
 */
export async function optimizeSkill(input: OptimizeInput): Promise<OptimizationResult> {
  const start = performance.now();
  const config = resolveConfig(input.config);
  const logger = input.logger ?? silentLogger;
  const stages: StageResult[] = [];

  async function stage<T>(name: StageName, fn: () => Promise<T>): Promise<T> {
    const t = performance.now();
    const value = await fn();
    stages.push({ stage: STAGES.indexOf(name) + 1, name, duration_ms: elapsed(t) });
    return value;
  }

  const common = { config, logger, signal: input.signal, random: input.random };

  const { trainset, valset } = await stage('split', () => resolveSets(input, config));
  logger.info(`${input.name}: ${trainset.length} training / ${valset.length} validation example(s)`);

  const baselineModule = createPromptModule({ name: input.name, skill: input.skill, invoke: input.invoke });
  const baseline = await stage('baseline', () => evaluateModule(baselineModule, valset, common));

  const bootstrap = await stage('bootstrap', () =>
    bootstrapDemonstrations(baselineModule, trainset, { ...common, metric: input.metric }),
  );

  const candidateModule = createPromptModule({
    name: `${input.name}+demos`,
    skill: input.skill,
    invoke: input.invoke,
    demonstrations: bootstrap.demonstrations,
  });
  const candidate = await stage('candidate', () => evaluateModule(candidateModule, valset, common));

  const comparison = await stage('compare', async () => compareRuns(baseline, candidate));
  logger.info(`${input.name}: ${comparison.verdict} (overall ${formatDelta(comparison.metrics.overall.delta)})`);

  return {
    trainset: trainset.map(e => e.id),
    valset: valset.map(e => e.id),
    baseline,
    bootstrap,
    candidate,
    comparison,
    optimizedSkill: renderSkill(input.skill, bootstrap.demonstrations),
    stages,
    duration_ms: elapsed(start),
  };
}

function formatDelta(delta: number): string {
  return `${delta >= 0 ? '+' : ''}${delta.toFixed(3)}`;
}

function elapsed(t: number): number {
  return Math.round(performance.now() - t);
}
