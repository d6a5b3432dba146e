export { ProcessingOrchestrator, buildRuleSet, QUEUE_SLOTS_PER_WORKER } from './orchestrator';
export type { RunOptions, RunResult, OrchestratorDeps } from './orchestrator';
export { RunAggregator } from './aggregator';
export type { Acceptance, AggregateResult, RunContext } from './aggregator';
export { BoundedQueue } from './queue';
