export { parseDueDate } from './date-parser.js';
