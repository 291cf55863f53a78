/**
 * Calendar tagger domain types.
 */

/** An event already on the user's calendar, resolved to absolute times. */
export interface ExistingEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
}

/** A suggested event detected in a message. */
export interface EventCandidate {
  title: string;
  start: Date;
  end?: Date;
  location?: string;
  meetingLink?: string;
  /** Ids of existing events overlapping the candidate, empty if none. */
  conflictsWith: string[];
  /** Detection score in [0,1]; see detectEvent for the heuristic. */
  confidence: number;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Calendar operations the digest consumes. Creation only ever happens in
 * response to an explicit user action.
 */
export interface CalendarCollaborator {
  listUpcomingEvents(window: TimeWindow): Promise<ExistingEvent[]>;
  createEvent(candidate: EventCandidate): Promise<string>;
}
