// Types
export * from './types/index.js';

// Errors
export { NoDataError, InvalidPriorityError, InvalidDateError, IoError } from './errors.js';

// Parsers
export { parseLine, parseIsoDate, formatDate } from './parsers/index.js';

// Model
export * from './model/index.js';

// List
export * from './list/index.js';

// Storage
export * from './storage/index.js';

// Queries
export * from './queries/index.js';

// Config
export { getDefaultTodoPath } from './config.js';
