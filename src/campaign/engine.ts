import type { CloseClient } from '../tools/close.js';
import type { StageMachine, TransitionRule } from './stages.js';
import { logger } from '../utils/logger.js';
import { MissingFieldError } from '../utils/errors.js';
import { systemClock, type Clock } from '../utils/retry.js';
import { ACCEPTED_DATE_FORMATS, formatCrmDate, parseFlexibleDate } from '../utils/dates.js';
import type {
    ChildTransition,
    FieldPatch,
    FieldValue,
    Opportunity,
    PartialTransitionFailure,
    RecordOutcome,
    ResolvedLead,
} from '../types/index.js';

export type SelectionPolicy =
    | { kind: 'first' }
    | { kind: 'each' }
    | { kind: 'oldest'; fieldId: string; formats?: readonly string[] };

export type RecordWriter = Pick<CloseClient, 'updateLead' | 'updateOpportunity'>;
export type ErrorRouteWriter = Pick<CloseClient, 'updateLead' | 'createNote'>;

function isBlank(value: FieldValue | undefined): boolean {
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * The candidate with the oldest parseable date in `fieldId`. Candidates whose
 * date does not parse are left out; on a tie the earlier one wins.
 */
export function selectOldest(
    candidates: Opportunity[],
    fieldId: string,
    formats: readonly string[] = ACCEPTED_DATE_FORMATS,
): Opportunity | undefined {
    let oldest: Opportunity | undefined;
    let oldestTime = Number.POSITIVE_INFINITY;

    for (const candidate of candidates) {
        const date = parseFlexibleDate(candidate.fields[fieldId], formats);
        if (!date) continue;
        if (date.getTime() < oldestTime) {
            oldest = candidate;
            oldestTime = date.getTime();
        }
    }
    return oldest;
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export function buildErrorNote(label: string, date: string, message: string): string {
    return `<body><p><strong>${escapeHtml(label)} (${date}):</strong> ${escapeHtml(message)}</p></body>`;
}

/** Moves a lead to the Error status and leaves an audit note explaining why. */
export class ErrorStageRouter {
    constructor(
        private readonly crm: ErrorRouteWriter,
        private readonly errorStatusId: string,
        private readonly label: string,
        private readonly clock: Clock = systemClock,
    ) {}

    async route(leadId: string, message: string): Promise<{ statusOk: boolean; noteOk: boolean }> {
        const status = await this.crm.updateLead(leadId, { status_id: this.errorStatusId });
        if (!status.ok) {
            logger.error(`Could not move lead ${leadId} to Error: ${status.message}`);
        }

        const note = buildErrorNote(this.label, formatCrmDate(this.clock.now()), message);
        const noteResult = await this.crm.createNote(leadId, note);
        if (!noteResult.ok) {
            logger.error(`Could not add the error note to lead ${leadId}: ${noteResult.message}`);
        }

        return { statusOk: status.ok, noteOk: noteResult.ok };
    }
}

export interface StageTransitionEngineOptions<S extends string> {
    machine: StageMachine<S>;
    selection: SelectionPolicy;
    writer: RecordWriter;
    /** Where a record that cannot be transitioned goes; without one it is only counted */
    errorRoute?: ErrorStageRouter;
    clock?: Clock;
}

export class StageTransitionEngine<S extends string> {
    private readonly machine: StageMachine<S>;
    private readonly selection: SelectionPolicy;
    private readonly writer: RecordWriter;
    private readonly errorRoute?: ErrorStageRouter;
    private readonly clock: Clock;

    constructor(options: StageTransitionEngineOptions<S>) {
        this.machine = options.machine;
        this.selection = options.selection;
        this.writer = options.writer;
        this.errorRoute = options.errorRoute;
        this.clock = options.clock ?? systemClock;
    }

    /** Advance every selected opportunity of one lead by one stage. */
    async advance(record: ResolvedLead): Promise<RecordOutcome> {
        const candidates = record.opportunities.filter(child => this.machine.ruleFor(child.statusId) !== undefined);
        if (candidates.length === 0) {
            return {
                status: 'ineligible',
                leadId: record.id,
                reason: `no opportunity in ${this.machine.describeSources()}`,
            };
        }

        const selected = this.select(candidates);
        if (selected.length === 0) {
            return { status: 'ineligible', leadId: record.id, reason: 'no opportunity with a usable date' };
        }

        try {
            for (const child of selected) {
                this.assertRequiredFields(child);
            }
        } catch (error) {
            if (!(error instanceof MissingFieldError)) throw error;
            return this.failWithMissingFields(record.id, error);
        }

        const today = formatCrmDate(this.clock.now());
        const transitions: ChildTransition[] = [];
        const failures: PartialTransitionFailure[] = [];

        for (const child of selected) {
            const rule = this.machine.ruleFor(child.statusId);
            if (!rule) continue;

            const transition = await this.apply(record.id, child, rule, today);
            transitions.push(transition);

            if (transition.childOk && transition.parentOk === false) {
                failures.push({
                    leadId: record.id,
                    childId: child.id,
                    from: rule.from,
                    to: rule.to,
                    childOk: true,
                    parentOk: false,
                    message: transition.message ?? 'lead update failed',
                });
            }
        }

        const childFailure = transitions.find(transition => !transition.childOk);
        if (childFailure) {
            return {
                status: 'failed',
                leadId: record.id,
                reason: childFailure.message ?? `opportunity ${childFailure.childId} update failed`,
                transitions,
                routedToError: false,
                failures,
            };
        }
        if (failures.length > 0) {
            return { status: 'partial', leadId: record.id, transitions, failures };
        }
        return { status: 'succeeded', leadId: record.id, transitions };
    }

    private select(candidates: Opportunity[]): Opportunity[] {
        switch (this.selection.kind) {
            case 'first':
                return candidates.slice(0, 1);
            case 'each':
                return candidates;
            case 'oldest': {
                const oldest = selectOldest(candidates, this.selection.fieldId, this.selection.formats);
                return oldest ? [oldest] : [];
            }
        }
    }

    private assertRequiredFields(child: Opportunity): void {
        const rule = this.machine.ruleFor(child.statusId);
        const missing = (rule?.requiredFields ?? []).filter(fieldId => isBlank(child.fields[fieldId]));
        if (missing.length > 0) {
            throw new MissingFieldError(child.id, missing);
        }
    }

    private async failWithMissingFields(leadId: string, error: MissingFieldError): Promise<RecordOutcome> {
        logger.warn(error.message);
        let routedToError = false;
        if (this.errorRoute) {
            const routed = await this.errorRoute.route(leadId, error.message);
            routedToError = routed.statusOk;
        }
        return { status: 'failed', leadId, reason: error.message, transitions: [], routedToError };
    }

    private async apply(
        leadId: string,
        child: Opportunity,
        rule: TransitionRule<S>,
        today: string,
    ): Promise<ChildTransition> {
        const mutation = rule.mutate(child, { today });
        const childPatch: FieldPatch = { status_id: this.machine.statusIdOf(rule.to), ...mutation.child };

        const childResult = await this.writer.updateOpportunity(child.id, childPatch);
        if (!childResult.ok) {
            logger.warn(`Opportunity ${child.id} not moved ${rule.from} → ${rule.to}: ${childResult.message}`);
            return {
                childId: child.id,
                from: rule.from,
                to: rule.to,
                childOk: false,
                parentOk: null,
                message: `opportunity update failed (${childResult.status})`,
            };
        }
        applyPatch(child, childPatch);

        if (!mutation.parent) {
            return { childId: child.id, from: rule.from, to: rule.to, childOk: true, parentOk: null };
        }

        const parentResult = await this.writer.updateLead(leadId, mutation.parent);
        if (!parentResult.ok) {
            logger.warn(`Lead ${leadId} not updated after opportunity ${child.id} moved to ${rule.to}: ${parentResult.message}`);
            return {
                childId: child.id,
                from: rule.from,
                to: rule.to,
                childOk: true,
                parentOk: false,
                message: `lead update failed (${parentResult.status})`,
            };
        }
        return { childId: child.id, from: rule.from, to: rule.to, childOk: true, parentOk: true };
    }
}

/** Mirror a successful write onto the in-memory record. */
function applyPatch(child: Opportunity, patch: FieldPatch): void {
    for (const [key, value] of Object.entries(patch)) {
        if (key === 'status_id') {
            child.statusId = typeof value === 'string' ? value : undefined;
        } else if (key.startsWith('custom.')) {
            child.fields[key.slice('custom.'.length)] = value;
        }
    }
}
