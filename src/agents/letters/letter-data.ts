import type { Registry } from '../../config/registry.js';
import type { LetterRequest } from '../../tools/postgrid.js';
import { convertIsoDate, splitDateList } from '../../utils/dates.js';
import type { FieldValue, Lead, Opportunity } from '../../types/index.js';

/** Everything a collection letter prints, as plain strings. Blank means unknown. */
export interface LetterData {
    firstName: string;
    lastName: string;
    address: string;
    address2: string;
    city: string;
    provinceOrState: string;
    postalOrZip: string;
    countryCode: string;
    plateNumber: string;
    plateLocation: string;
    make: string;
    model: string;
    lastMailDate: string;
    value: string;
    citationNumber: string;
    citationDate: string;
    citationTime: string;
    lotLocation: string;
    citationImageUrl: string;
    fineAmount: string;
    serviceFee: string;
    firstMailer: string;
    secondMailer: string;
    template: string;
}

type RoundStage = 'round_1' | 'round_2' | 'round_3';

function text(value: FieldValue | undefined): string {
    return value === null || value === undefined ? '' : String(value);
}

/** `"ABC123 North Carolina"` → `["ABC123", "North Carolina"]` */
export function splitOnFirstSpace(value: string): [string, string] {
    const index = value.indexOf(' ');
    return index === -1 ? [value, ''] : [value.slice(0, index), value.slice(index + 1)];
}

export interface MailingAddress {
    address: string;
    address2: string;
    city: string;
    provinceOrState: string;
    postalOrZip: string;
    countryCode: string;
}

/** `"12 Main St, Charlotte, NC 28202"` → parts. A single segment is kept whole as the street. */
export function parseMailingAddress(value: string): MailingAddress | null {
    if (!value) return null;

    const parts = value.split(',').map(part => part.trim());
    const address: MailingAddress = {
        address: value,
        address2: '',
        city: '',
        provinceOrState: '',
        postalOrZip: '',
        countryCode: 'US',
    };

    if (parts.length >= 3) {
        const [state, zip] = splitOnFirstSpace(parts[2]);
        address.address = parts[0];
        address.city = parts[1];
        address.provinceOrState = state;
        address.postalOrZip = zip;
    } else if (parts.length === 2) {
        address.address = parts[0];
        address.city = parts[1];
    }
    return address;
}

/** `0` → `"0"`, `50.0` → `"50"`, `65.5` → `"65.50"`. Non-numeric text comes back unchanged. */
export function formatMonetaryValue(value: FieldValue | undefined): string {
    const raw = text(value).trim();
    if (raw === '') return '';

    const amount = Number(raw);
    if (!Number.isFinite(amount)) return raw;
    if (amount === 0) return '0';
    return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

/** Round 2 letters print the first mailer date; round 3 letters print the first two. */
export function mailerDatesForRound(stage: RoundStage | undefined, mailerDates: FieldValue | undefined): { firstMailer: string; secondMailer: string } {
    const dates = splitDateList(mailerDates);
    if (stage === 'round_2') {
        return { firstMailer: convertIsoDate(dates[0] ?? ''), secondMailer: '' };
    }
    if (stage === 'round_3') {
        return { firstMailer: convertIsoDate(dates[0] ?? ''), secondMailer: convertIsoDate(dates[1] ?? '') };
    }
    return { firstMailer: '', secondMailer: '' };
}

export function roundStageOf(statusId: string | undefined, registry: Registry): RoundStage | undefined {
    const { round_1, round_2, round_3 } = registry.opportunityStatuses;
    if (statusId === round_1) return 'round_1';
    if (statusId === round_2) return 'round_2';
    if (statusId === round_3) return 'round_3';
    return undefined;
}

/**
 * Assemble the letter for one lead from its detail and the opportunity
 * currently in a mailer round (if any).
 */
export function assembleLetter(lead: Lead, opportunity: Opportunity | undefined, registry: Registry): LetterData {
    const names = registry.leadCustomNames;
    const fields = registry.opportunityFields;

    const contactName = lead.contacts[0]?.display_name ?? lead.contacts[0]?.name ?? '';
    const [firstName, lastName] = splitOnFirstSpace(contactName);
    const [plateNumber, plateLocation] = splitOnFirstSpace(lead.name);
    const mailing = parseMailingAddress(text(lead.custom[names.mailingAddress]));

    const opportunityField = (fieldId: string): FieldValue | undefined => opportunity?.fields[fieldId];
    const valueFormatted = opportunity?.valueFormatted ?? '';
    const stage = roundStageOf(opportunity?.statusId, registry);
    const mailers = mailerDatesForRound(stage, opportunityField(fields.mailerDates));

    return {
        firstName,
        lastName,
        address: mailing?.address ?? '',
        address2: mailing?.address2 ?? '',
        city: mailing?.city ?? '',
        provinceOrState: mailing?.provinceOrState ?? '',
        postalOrZip: mailing?.postalOrZip ?? '',
        countryCode: mailing?.countryCode ?? '',
        plateNumber,
        plateLocation,
        make: text(lead.custom[names.make]),
        model: text(lead.custom[names.model]),
        lastMailDate: convertIsoDate(text(lead.custom[names.lastMailDate])),
        value: formatMonetaryValue(valueFormatted.startsWith('$') ? valueFormatted.slice(1) : valueFormatted),
        citationNumber: text(opportunityField(fields.citationNumber)),
        citationDate: convertIsoDate(text(opportunityField(fields.citationDate))),
        citationTime: text(opportunityField(fields.citationTime)),
        lotLocation: text(opportunityField(fields.lotAddress)),
        citationImageUrl: text(opportunityField(fields.citationImageUrl)),
        fineAmount: formatMonetaryValue(opportunityField(fields.fineAmount)),
        serviceFee: formatMonetaryValue(opportunityField(fields.serviceFee)),
        firstMailer: mailers.firstMailer,
        secondMailer: mailers.secondMailer,
        template: text(opportunityField(fields.template)),
    };
}

/** The reason a letter cannot be sent, or null when it can. */
export function validateLetter(letter: LetterData): string | null {
    if (!letter.template) return 'No template ID found';
    if (!letter.firstName || !letter.lastName || !letter.address) return 'Missing required contact information';
    return null;
}

export function toLetterRequest(letter: LetterData, today: string): LetterRequest {
    return {
        to: {
            firstName: letter.firstName,
            lastName: letter.lastName,
            addressLine1: letter.address,
            addressLine2: letter.address2,
            city: letter.city,
            provinceOrState: letter.provinceOrState,
            postalOrZip: letter.postalOrZip,
            countryCode: letter.countryCode || 'US',
        },
        template: letter.template,
        description: `Invoice ${letter.citationNumber} (${today})`,
        mergeVariables: {
            'citation number': letter.citationNumber,
            'last mail date': letter.lastMailDate,
            'value': letter.value,
            'plate number': letter.plateNumber,
            'plate location': letter.plateLocation,
            'make': letter.make,
            'model': letter.model,
            'citation date': letter.citationDate,
            'citation time': letter.citationTime,
            'lot location': letter.lotLocation,
            'first mailer': letter.firstMailer,
            'second mailer': letter.secondMailer,
            'fine amount': letter.fineAmount,
            'service fee': letter.serviceFee,
            'citation image url': letter.citationImageUrl,
        },
    };
}
