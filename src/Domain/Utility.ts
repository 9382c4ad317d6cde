/**
 * Central enumeration of well-known event names for typed event bus helpers.
 * Extend as new events are introduced.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    configError: 'config.error',
    catalogLoaded: 'catalog.loaded',
    sessionValueChanged: 'session.value.changed',
    sessionDiscarded: 'session.discarded',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
