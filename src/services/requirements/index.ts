export { DocumentSource, FileSystemDocumentSource, StaticDocumentSource, DOCUMENT_EXTENSIONS } from './source';
export { synchronizeRequirements, sameRequirement, SyncReport } from './sync';
export { filterVisible } from './visibility';
