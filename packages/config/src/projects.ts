import { z } from 'zod';

export const PHASE_NAMES = ['staging', 'production', 'sandbox'] as const;
export type PhaseName = (typeof PHASE_NAMES)[number];

export const PHASE_KINDS = ['kustomize', 'kanvas'] as const;
export type PhaseKind = (typeof PHASE_KINDS)[number];

const PHASE_ALIASES = new Map<string, PhaseName>([
  ['staging', 'staging'],
  ['stg', 'staging'],
  ['production', 'production'],
  ['pro', 'production'],
  ['prd', 'production'],
  ['sandbox', 'sandbox'],
]);

/**
 * Maps a phase name or one of its short aliases (stg, pro, prd) to the
 * canonical phase name.
 */
export function normalizePhaseName(value: string): PhaseName | undefined {
  return PHASE_ALIASES.get(value.trim().toLowerCase());
}

const phaseNameSchema = z.string().transform((value, ctx) => {
  const name = normalizePhaseName(value);
  if (!name) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown phase "${value}"` });
    return z.NEVER;
  }
  return name;
});

const registrySchema = z.object({
  registryId: z.string().min(1),
  repository: z.string().min(1),
  tagPattern: z.string().min(1),
  targetPattern: z.string().min(1).optional(),
});

const phaseSchema = z.object({
  name: phaseNameSchema,
  kind: z.enum(PHASE_KINDS),
  path: z.string().default(''),
  autoDeploy: z.boolean().default(false),
  notifyChannel: z.string().min(1).optional(),
  disableBranchDeploy: z.boolean().default(false),
});

const projectSchema = z
  .object({
    id: z.string().regex(/^[0-9a-zA-Z-]+$/, 'Project id may only contain letters, digits and dashes'),
    repository: z.string().min(1),
    defaultBranch: z.string().min(1).default('master'),
    imageName: z.string().min(1).optional(),
    registry: registrySchema,
    phases: z.array(phaseSchema).default([]),
  })
  .superRefine((project, ctx) => {
    const seen = new Set<string>();
    for (const phase of project.phases) {
      if (seen.has(phase.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Phase "${phase.name}" is declared twice in project "${project.id}"`,
          path: ['phases'],
        });
      }
      seen.add(phase.name);
    }
  })
  .transform((project) => ({
    ...project,
    imageName: project.imageName ?? project.registry.repository,
  }));

const userSchema = z.object({
  chatId: z.string().min(1),
  githubLogin: z.string().min(1).optional(),
  githubNodeId: z.string().min(1).optional(),
});

export const projectsFileSchema = z
  .object({
    users: z.array(userSchema).default([]),
    projects: z.array(projectSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    for (const project of file.projects) {
      if (seen.has(project.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Project "${project.id}" is declared twice`,
          path: ['projects'],
        });
      }
      seen.add(project.id);
    }
  });

export type RegistryCoordinates = z.output<typeof registrySchema>;
export type Phase = z.output<typeof phaseSchema>;
export type Project = z.output<typeof projectSchema>;
export type User = z.output<typeof userSchema>;
export type ProjectsFile = z.output<typeof projectsFileSchema>;

export function findPhase(project: Project, name: string): Phase | undefined {
  const normalized = normalizePhaseName(name);
  return project.phases.find((phase) => phase.name === normalized);
}
