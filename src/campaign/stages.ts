import type { OpportunityStage, Registry } from '../config/registry.js';
import { customKey } from '../config/registry.js';
import { appendDate } from '../utils/dates.js';
import type { FieldPatch, Opportunity } from '../types/index.js';

/**
 * Stage machines for the mailer campaign.
 *
 * A workflow declares its transitions as a table keyed by the source stage.
 * Nothing else can move a record: the engine only writes `status_id` values
 * it finds in a rule's `to`.
 */

export interface TransitionContext {
    /** Today's date as the CRM stores it (MM/dd/yyyy) */
    today: string;
}

export interface TransitionMutation {
    /** Written to the opportunity alongside the new status */
    child: FieldPatch;
    /** Written to the lead after the opportunity write succeeds */
    parent?: FieldPatch;
}

export interface TransitionRule<S extends string> {
    from: S;
    to: S;
    /** Opportunity field ids that must be set before the transition may run */
    requiredFields?: readonly string[];
    mutate(child: Opportunity, context: TransitionContext): TransitionMutation;
}

export type TransitionTable<S extends string> = Partial<Record<S, TransitionRule<S>>>;

export interface StageMachine<S extends string> {
    name: string;
    rules: TransitionRule<S>[];
    statusIdOf(stage: S): string;
    stageOf(statusId: string | undefined): S | undefined;
    ruleFor(statusId: string | undefined): TransitionRule<S> | undefined;
    /** Source stages, for log lines */
    describeSources(): string;
}

export function createStageMachine<S extends string>(
    name: string,
    statusIds: Record<S, string>,
    table: TransitionTable<S>,
): StageMachine<S> {
    const rules: TransitionRule<S>[] = [];
    const stagesByStatus = new Map<string, S>();
    const rulesByStatus = new Map<string, TransitionRule<S>>();

    for (const [key, rule] of Object.entries<TransitionRule<S> | undefined>(table)) {
        if (!rule) continue;
        if (rule.from !== key) {
            throw new Error(`${name}: rule under "${key}" starts from "${rule.from}"`);
        }
        rules.push(rule);
        stagesByStatus.set(statusIds[rule.from], rule.from);
        stagesByStatus.set(statusIds[rule.to], rule.to);
        rulesByStatus.set(statusIds[rule.from], rule);
    }

    return {
        name,
        rules,
        statusIdOf: (stage) => statusIds[stage],
        stageOf: (statusId) => (statusId === undefined ? undefined : stagesByStatus.get(statusId)),
        ruleFor: (statusId) => (statusId === undefined ? undefined : rulesByStatus.get(statusId)),
        describeSources: () => rules.map(rule => rule.from).join(', '),
    };
}

// ============================================================================
// Campaign tables
// ============================================================================

/**
 * Unpaid → Round 1. Mailer dates start over with today. The first mailer
 * quotes the citation, so an opportunity without a citation number goes to Error.
 */
export function roundOneTable(registry: Registry): TransitionTable<OpportunityStage> {
    const { opportunityFields, leadFields, templates } = registry;
    return {
        unpaid: {
            from: 'unpaid',
            to: 'round_1',
            requiredFields: [opportunityFields.citationNumber],
            mutate: (_child, { today }) => ({
                child: {
                    [customKey(opportunityFields.mailerDates)]: today,
                    [customKey(opportunityFields.template)]: templates.round_1,
                },
                parent: { [customKey(leadFields.lastMailDate)]: today },
            }),
        },
    };
}

/** Round 1 → 2 → 3. Each round appends today to the mailer dates. */
export function followUpTable(registry: Registry): TransitionTable<OpportunityStage> {
    const { opportunityFields, leadFields, templates } = registry;

    const followUp = (from: OpportunityStage, to: 'round_2' | 'round_3'): TransitionRule<OpportunityStage> => ({
        from,
        to,
        mutate: (child, { today }) => ({
            child: {
                [customKey(opportunityFields.mailerDates)]: appendDate(child.fields[opportunityFields.mailerDates], today),
                [customKey(opportunityFields.template)]: templates[to],
            },
            parent: { [customKey(leadFields.lastMailDate)]: today },
        }),
    });

    return {
        round_1: followUp('round_1', 'round_2'),
        round_2: followUp('round_2', 'round_3'),
    };
}

/** Hold → Unpaid. Only the status changes and the lead is not written. */
export function holdsTable(): TransitionTable<OpportunityStage> {
    return {
        hold: {
            from: 'hold',
            to: 'unpaid',
            mutate: () => ({ child: {} }),
        },
    };
}
