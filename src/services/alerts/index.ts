export { FileAlertSource } from './file-source.js';
export type { FileAlertSourceOptions } from './file-source.js';
export { parseAlert, normalizeSeverity } from './schema.js';
