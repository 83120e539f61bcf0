export { loadEntities, parseEntities, toEntityRecord } from './entity-loader.js';
export { ENTITY_SCHEMA } from './types.js';
export type { EntityRecord, EntityField } from './types.js';
