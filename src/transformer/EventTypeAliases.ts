/**
 * Maps a source spelling of an event type to the canonical label.
 * Source labels are compared after upper-casing and whitespace cleanup.
 */
export interface EventTypeAlias {
    sourceLabel: string;       // e.g. 'TSTM WIND'
    canonicalLabel: string;    // e.g. 'THUNDERSTORM WIND'
}

/**
 * Known abbreviations and plural/variant spellings in the NOAA storm
 * database. Only used when label canonicalization is switched on.
 */
export const EVENT_TYPE_ALIASES: EventTypeAlias[] = [
    { sourceLabel: 'TSTM WIND', canonicalLabel: 'THUNDERSTORM WIND' },
    { sourceLabel: 'THUNDERSTORM WINDS', canonicalLabel: 'THUNDERSTORM WIND' },
    { sourceLabel: 'THUNDERSTORMS WINDS', canonicalLabel: 'THUNDERSTORM WIND' },
    { sourceLabel: 'MARINE TSTM WIND', canonicalLabel: 'MARINE THUNDERSTORM WIND' },
    { sourceLabel: 'FLASH FLOODING', canonicalLabel: 'FLASH FLOOD' },
    { sourceLabel: 'FLOODING', canonicalLabel: 'FLOOD' },
    { sourceLabel: 'FLOODS', canonicalLabel: 'FLOOD' },
    { sourceLabel: 'RIP CURRENTS', canonicalLabel: 'RIP CURRENT' },
    { sourceLabel: 'EXTREME HEAT', canonicalLabel: 'EXCESSIVE HEAT' },
    { sourceLabel: 'HEAT WAVE', canonicalLabel: 'HEAT' },
    { sourceLabel: 'HURRICANE', canonicalLabel: 'HURRICANE/TYPHOON' },
    { sourceLabel: 'TYPHOON', canonicalLabel: 'HURRICANE/TYPHOON' },
    { sourceLabel: 'WILD/FOREST FIRE', canonicalLabel: 'WILDFIRE' },
    { sourceLabel: 'WILD FIRES', canonicalLabel: 'WILDFIRE' },
    { sourceLabel: 'STORM SURGE', canonicalLabel: 'STORM SURGE/TIDE' },
    { sourceLabel: 'WINTER STORMS', canonicalLabel: 'WINTER STORM' },
    { sourceLabel: 'FOG', canonicalLabel: 'DENSE FOG' },
];
