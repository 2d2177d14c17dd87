/**
 * Store exports
 */

export {
  createDatabase,
  mutate,
  read,
  parseInput,
  translateError,
  sqliteCode,
  SINGLE_OPEN_INDEX,
} from './database.js';
export type { Db, DatabaseOptions, SqlValue } from './database.js';

export {
  MIGRATIONS,
  SCHEMA_VERSION,
  getSchemaVersion,
  initializeSchema,
  runMigrations,
} from './schema.js';
export type { Migration } from './schema.js';

export {
  createProfile,
  getProfile,
  requireProfile,
  listProfiles,
  updateProfile,
  setProfileArchived,
  deleteProfile,
} from './profiles.js';
export type { CreateProfileInput, UpdateProfileInput } from './profiles.js';

export {
  createService,
  getService,
  requireService,
  listServices,
  updateService,
  deleteService,
} from './services.js';
export type { CreateServiceInput, UpdateServiceInput } from './services.js';

export {
  createProject,
  getProject,
  requireProject,
  listProjects,
  updateProject,
  deleteProject,
} from './projects.js';
export type { CreateProjectInput, UpdateProjectInput } from './projects.js';

export {
  addProfileService,
  getProfileService,
  requireProfileService,
  listProfileServices,
  updateProfileServiceNotes,
  deleteProfileService,
} from './profile-services.js';
export type { AddProfileServiceInput } from './profile-services.js';

export {
  TODO_KINDS,
  addTodo,
  getTodo,
  listTodos,
  setTodoCompleted,
  updateTodoText,
  deleteTodo,
} from './todos.js';

export {
  openEntry,
  closeEntry,
  findOpenEntry,
  getEntry,
  requireEntry,
  listEntries,
  addManualEntry,
  updateEntry,
  deleteEntry,
  deleteEntries,
  entryDuration,
} from './entries.js';
export type { OpenEntryInput, ManualEntryInput, UpdateEntryInput, EntryFilter } from './entries.js';
