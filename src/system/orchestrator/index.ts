export { runOnce } from './orchestrator';
export { findSelection, describeSelection } from './helpers';

export type { RunContext, RunOutcome, StationSelection } from './types';
