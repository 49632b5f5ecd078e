export { parseDate, parseDueDate, dateToDueIso, formatDate, addDays } from './date-parser.js';
export { parseTaskText } from './task-text-parser.js';
export type { ParsedTaskText } from './task-text-parser.js';
