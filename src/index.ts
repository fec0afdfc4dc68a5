// Mailer campaign operations: library entry point
export { RequestExecutor, readRateSignal } from './tools/executor.js';
export type { ApiRequest, ExecuteResult, ExecutorOptions, RateSignal } from './tools/executor.js';
export { fetchAll } from './tools/paginator.js';
export type { Page, FetchAllOptions } from './tools/paginator.js';
export { CloseClient, extractCustomFields } from './tools/close.js';
export type { DetailResult, SearchResult, WriteResult, OutboundEmail } from './tools/close.js';
export { PostGridClient } from './tools/postgrid.js';
export type { LetterRequest, LetterResult } from './tools/postgrid.js';
export { SlackNotifier, mentionGroup } from './tools/slack.js';

export { RecordResolver, CrossAccountLookup, formatBusinessAddress } from './campaign/resolver.js';
export { StageTransitionEngine, ErrorStageRouter, selectOldest } from './campaign/engine.js';
export type { SelectionPolicy } from './campaign/engine.js';
export { createStageMachine, roundOneTable, followUpTable, holdsTable } from './campaign/stages.js';
export type { StageMachine, TransitionRule, TransitionTable } from './campaign/stages.js';
export { runCampaign } from './orchestrator.js';

export { MailerRoundsAgent } from './agents/mailer-rounds/index.js';
export { HoldsAgent } from './agents/holds/index.js';
export { LettersAgent } from './agents/letters/index.js';
export { AssignmentAgent } from './agents/assignment/index.js';
export { FindOwnerAgent, runFindOwner } from './agents/find-owner/index.js';
export { MissingLotAgent, runMissingLot } from './agents/missing-lot/index.js';
export { ActivityReportAgent } from './agents/activity/index.js';

export { bootstrap, createCloseClient, createPostGridClient, createSlackNotifier } from './bootstrap.js';
export type { Runtime } from './bootstrap.js';
export { loadConfig, loadQuery, loadSalesReps } from './config/index.js';
export type { Config } from './config/index.js';
export { loadRegistry, validateRegistry, customKey } from './config/registry.js';
export type { Registry } from './config/registry.js';
export { ConfigError, MissingFieldError, HttpStatusError } from './utils/errors.js';
export type { RunSummary } from './utils/metrics.js';
export type * from './types/index.js';
export { halfWrittenChildren } from './types/index.js';
