export { selectDayEvents, formatTimeRange, renderAgenda, buildAgenda } from './agenda.js'
export type { AgendaResult } from './agenda.js'
