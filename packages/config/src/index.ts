export { loadEnv } from './env.js';
export type { Env } from './env.js';

export {
  PHASE_NAMES,
  PHASE_KINDS,
  normalizePhaseName,
  projectsFileSchema,
  findPhase,
} from './projects.js';
export type {
  PhaseName,
  PhaseKind,
  RegistryCoordinates,
  Phase,
  Project,
  User,
  ProjectsFile,
} from './projects.js';

export {
  ProjectCatalog,
  CatalogError,
  parseProjectsFile,
  findProject,
  findUser,
} from './catalog.js';
export type { ProjectSnapshot } from './catalog.js';
