/**
 * @fileoverview Public API of @brrealty/acquisition.
 *
 * Registry, retry policy, series aggregator and the orchestrator that ties
 * them to the cache stores and source adapters.
 *
 * @module @brrealty/acquisition
 */

export { SourceRegistry, loadRegistry, ALL_CATEGORIES } from './registry.js';
export type { DatasetDefinition, DatasetFilter, DatasetSummary } from './registry.js';

export { resolveRequest, MAX_ATTEMPTS_LIMIT } from './request.js';

export { RetryPolicy, classifyRows, DEFAULT_RETRY_OPTIONS } from './retry-policy.js';
export type { AttemptResult, RetryPolicyOptions, Sleep } from './retry-policy.js';

export { aggregate, foldResult, toOutcome, EMPTY_STATE } from './aggregator.js';
export type { AggregateOptions, AggregateResult, AggregateState, FetchOne } from './aggregator.js';

export { Orchestrator, joinMetadata } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
