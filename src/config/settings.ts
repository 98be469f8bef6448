// src/config/settings.ts
import { z } from 'zod';
import { BASE_DEFAULTS, BuildConfig } from '../build/build-config';

export const SETTINGS = Symbol('SETTINGS');

export class MissingConfigurationError extends Error {
  constructor(readonly variables: string[]) {
    super(`Missing or invalid configuration: ${variables.join(', ')}`);
    this.name = 'MissingConfigurationError';
  }
}

export interface GithubSettings {
  apiBaseUrl: string;
  owner: string;
  repo: string;
  workflowFile: string;
  dispatchRef: string;
  token: string;
  timeoutMs: number;
}

export interface Settings {
  telegramToken: string;
  github: GithubSettings;
  defaults: BuildConfig;
}

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1);

const withDefault = (value: string) => z.string().trim().min(1).default(value);

const optional = () =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: required('TELEGRAM_BOT_TOKEN'),
  GITHUB_TOKEN: required('GITHUB_TOKEN'),
  GITHUB_OWNER: withDefault('zyexro'),
  GITHUB_REPO: withDefault('kernel_builder'),
  GITHUB_WORKFLOW: withDefault('main.yml'),
  GITHUB_REF: withDefault('enanan'),
  GITHUB_API_URL: withDefault('https://api.github.com'),
  GITHUB_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  TELEGRAM_CHAT_ID: optional(),

  DEFAULT_COMPILER: withDefault(BASE_DEFAULTS.compiler),
  DEFAULT_KERNEL_REPO: withDefault(BASE_DEFAULTS.kernelRepoUrl),
  DEFAULT_KERNEL_BRANCH: withDefault(BASE_DEFAULTS.kernelBranch),
  DEFAULT_CONTAINER: withDefault(BASE_DEFAULTS.containerImage),
  DEFAULT_NOTES: optional(),
  DEFAULT_SUFFIX: optional(),
  DEFAULT_ZIP_REPO: optional(),
  DEFAULT_ZIP_BRANCH: optional(),
  DEFAULT_KSU: optional(),
});

export type Env = z.infer<typeof envSchema>;

/** Validates the raw environment; called once by the settings factory. */
export function validateEnv(raw: Record<string, unknown>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const variables = [
      ...new Set(result.error.issues.map((issue) => issue.path.join('.'))),
    ];
    throw new MissingConfigurationError(variables);
  }
  return result.data;
}

export function buildSettings(env: Env): Settings {
  return {
    telegramToken: env.TELEGRAM_BOT_TOKEN,
    github: {
      apiBaseUrl: env.GITHUB_API_URL.replace(/\/$/, ''),
      owner: env.GITHUB_OWNER,
      repo: env.GITHUB_REPO,
      workflowFile: env.GITHUB_WORKFLOW,
      dispatchRef: env.GITHUB_REF,
      token: env.GITHUB_TOKEN,
      timeoutMs: env.GITHUB_TIMEOUT_MS,
    },
    defaults: {
      compiler: env.DEFAULT_COMPILER,
      kernelRepoUrl: env.DEFAULT_KERNEL_REPO,
      kernelBranch: env.DEFAULT_KERNEL_BRANCH,
      containerImage: env.DEFAULT_CONTAINER,
      notes: env.DEFAULT_NOTES ?? '',
      suffix: env.DEFAULT_SUFFIX ?? '',
      zipRepoUrl: env.DEFAULT_ZIP_REPO ?? '',
      zipBranch: env.DEFAULT_ZIP_BRANCH ?? '',
      kernelSuMode: env.DEFAULT_KSU ?? '',
      notifyRecipient: env.TELEGRAM_CHAT_ID ?? '',
    },
  };
}
