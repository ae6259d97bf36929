export { ProfileCatalog, profileEntrySchema } from './profile-catalog.js';
export type { ServerProfile } from './profile-catalog.js';
