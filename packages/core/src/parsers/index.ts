export { parseIsoDate, formatDate, isLeapYear, daysInMonth, isValidCalendarDate } from './date-parser.js';
export { parseLine } from './line-parser.js';
