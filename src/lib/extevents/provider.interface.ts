/**
 * External calendar provider interface.
 *
 * The sync pipeline only needs the list of events a source currently holds;
 * talking to Google, an ICS feed or anything else is the adapter's business.
 */

import type { ExternalEventDraft, ExternalEventSource } from '../types/extevents.types';

export interface ExternalCalendarProvider {
    /** Provider identifier, matches external_event_sources.provider */
    readonly providerId: string;

    /**
     * Fetch every event the source holds right now. Recurring series come as
     * one parent draft plus one draft per instance pointing at it.
     */
    fetchEvents(source: ExternalEventSource): Promise<ExternalEventDraft[]>;
}
