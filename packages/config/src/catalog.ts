import { EventEmitter } from 'node:events';
import fs from 'fs-extra';
import { parse } from 'yaml';
import { logger } from '@autodeploy/logger';
import { projectsFileSchema, type Project, type User } from './projects.js';

/**
 * Immutable view of the projects and users loaded by one reload cycle.
 * In-flight work keeps the snapshot it started with.
 */
export interface ProjectSnapshot {
  readonly generation: number;
  readonly loadedAt: Date;
  readonly projects: readonly Project[];
  readonly users: readonly User[];
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

const EMPTY_SNAPSHOT: ProjectSnapshot = Object.freeze({
  generation: 0,
  loadedAt: new Date(0),
  projects: Object.freeze([]),
  users: Object.freeze([]),
});

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse and validate a projects file.
 */
export function parseProjectsFile(content: string, source: string): Pick<ProjectSnapshot, 'projects' | 'users'> {
  let document: unknown;
  try {
    document = parse(content) ?? {};
  } catch (error) {
    throw new CatalogError(`Invalid YAML in ${source}`, source, { cause: error });
  }

  const result = projectsFileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new CatalogError(`Invalid projects file ${source}: ${issues}`, source, { cause: result.error });
  }

  return result.data;
}

export function findProject(snapshot: ProjectSnapshot, id: string): Project | undefined {
  return snapshot.projects.find((project) => project.id === id);
}

export function findUser(snapshot: ProjectSnapshot, chatId: string): User | undefined {
  return snapshot.users.find((user) => user.chatId === chatId);
}

/**
 * Holds the current project snapshot and swaps it wholesale on reload.
 */
export class ProjectCatalog extends EventEmitter {
  private snapshot: ProjectSnapshot = EMPTY_SNAPSHOT;

  constructor(private readonly filePath: string) {
    super();
  }

  get current(): ProjectSnapshot {
    return this.snapshot;
  }

  /**
   * Re-read the projects file. On failure the previous snapshot stays current.
   */
  async reload(): Promise<ProjectSnapshot> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new CatalogError(`Unable to read ${this.filePath}`, this.filePath, { cause: error });
    }

    const { projects, users } = parseProjectsFile(content, this.filePath);
    const next: ProjectSnapshot = deepFreeze({
      generation: this.snapshot.generation + 1,
      loadedAt: new Date(),
      projects,
      users,
    });

    this.snapshot = next;

    logger.info({
      generation: next.generation,
      projects: next.projects.length,
      users: next.users.length,
    }, 'Projects and users reloaded');

    this.emit('reloaded', next);
    return next;
  }

  onReload(listener: (snapshot: ProjectSnapshot) => void): () => void {
    this.on('reloaded', listener);
    return () => {
      this.off('reloaded', listener);
    };
  }
}
