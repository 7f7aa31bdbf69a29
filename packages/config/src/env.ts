import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1),
  // Source control
  GITHUB_TOKEN: z.string().min(1),
  GITHUB_ORG: z.string().min(1),
  CONFIG_REPOSITORY: z
    .string()
    .url()
    .refine((value) => value.startsWith('https://'), 'CONFIG_REPOSITORY must be an https:// URL'),
  CONFIG_DEFAULT_BRANCH: z.string().min(1).default('master'),
  GIT_USERNAME: z.string().min(1).default('autodeploy'),
  GIT_AUTHOR_EMAIL: optionalString,
  // Working copies live under GIT_ROOT; scratch directories are used when unset
  GIT_ROOT: optionalString,
  // Projects and users
  PROJECTS_FILE: z.string().min(1).default('projects.yaml'),
  RELOAD_INTERVAL_SECONDS: z.coerce.number().int().nonnegative().default(0),
  // Watcher
  AUTO_DEPLOY_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  // Registry
  AWS_REGION: z.string().min(1).default('ap-northeast-1'),
  // Delegated apply tool
  APPLY_TOOL_COMMAND: z.string().min(1).default('kanvas'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
