export { entityRecordSchema, formatZodIssues } from './schemas.js';
