export { buildModuleDocuments, serializeDocument } from './module-documents.js';
export type { ModuleDocument } from './module-documents.js';
