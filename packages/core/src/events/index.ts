export type { EventRecord, EventPayload, TimedRecord, ResolvedEvent } from './types.js'
export { DEFAULT_TITLE, eventRecordSchema, eventPayloadSchema } from './types.js'
export { readEventsFile, parseEventPayload, hasInterval, resolveTitle } from './loader.js'
