import { EVENT_TYPE_ALIASES } from './EventTypeAliases.ts';

import type { EventTypeAlias } from './EventTypeAliases.ts';

export type LabelCanonicalizer = (label: string) => string;

/**
 * Upper-cases, trims and collapses runs of whitespace.
 */
export function cleanEventType(label: string): string {
    return label.trim().replace(/\s+/g, ' ').toUpperCase();
}

/**
 * Builds a canonicalizer from an alias list. Aliases are matched on the
 * cleaned label; labels without an alias come back cleaned.
 */
export function createLabelCanonicalizer(
    aliases: EventTypeAlias[] = EVENT_TYPE_ALIASES
): LabelCanonicalizer {
    const lookup = new Map(
        aliases.map((a) => [cleanEventType(a.sourceLabel), cleanEventType(a.canonicalLabel)])
    );

    return (label: string) => {
        const cleaned = cleanEventType(label);
        return lookup.get(cleaned) ?? cleaned;
    };
}

export const canonicalizeEventType: LabelCanonicalizer = createLabelCanonicalizer();
