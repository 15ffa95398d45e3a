export * from './types.js';
export * from './schemas.js';
export * from './errors.js';
export { resolveConfig, loadConfig, toValidationIssues } from './config.js';
export { loadCorpus, parseCorpus } from './corpus.js';
export { canonicalize } from './canonical.js';
export { fingerprint, fingerprintCorpus, isFingerprint } from './fingerprint.js';
export { createRng, seededShuffle } from './random.js';
export type { Rng } from './random.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
