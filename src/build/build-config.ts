// src/build/build-config.ts

export interface BuildConfig {
  compiler: string;
  kernelRepoUrl: string;
  kernelBranch: string;
  notes: string;
  suffix: string;
  zipRepoUrl: string;
  zipBranch: string;
  kernelSuMode: string;
  notifyRecipient: string;
  containerImage: string;
}

export type BuildField = keyof BuildConfig;

export const REQUIRED_FIELDS = [
  'compiler',
  'kernelRepoUrl',
  'kernelBranch',
  'containerImage',
] as const satisfies readonly BuildField[];

export const OPTIONAL_FIELDS = [
  'notes',
  'suffix',
  'zipRepoUrl',
  'zipBranch',
  'kernelSuMode',
] as const satisfies readonly BuildField[];

export type RequiredField = (typeof REQUIRED_FIELDS)[number];
export type OptionalField = (typeof OPTIONAL_FIELDS)[number];

// workflow_dispatch input names
export const WORKFLOW_INPUT_NAMES: Record<
  RequiredField | OptionalField,
  string
> = {
  compiler: 'COMPILER',
  kernelRepoUrl: 'KREPO',
  kernelBranch: 'KBRANCH',
  containerImage: 'CONTAINER',
  notes: 'NOTES',
  suffix: 'SUFFIX',
  zipRepoUrl: 'ZREPO',
  zipBranch: 'ZBRANCH',
  kernelSuMode: 'KSU',
};

export const RECIPIENT_INPUT_NAME = 'TG_RECIPIENT';

export const BASE_DEFAULTS: BuildConfig = {
  compiler: 'Geopelia-Clang-20',
  kernelRepoUrl: 'https://github.com/TelegramAt25/niigo_kernel_xiaomi_blossom',
  kernelBranch: 'yoka',
  notes: '',
  suffix: '',
  zipRepoUrl: '',
  zipBranch: '',
  kernelSuMode: '',
  notifyRecipient: '',
  containerImage: 'fedora:40',
};

export function isOptionalField(field: BuildField): field is OptionalField {
  return (OPTIONAL_FIELDS as readonly BuildField[]).includes(field);
}

/** Fresh copy, so a conversation never mutates the shared defaults. */
export function createBuildConfig(defaults: BuildConfig): BuildConfig {
  return { ...defaults };
}

/**
 * Workflow inputs for a finished config: required fields always, optional
 * ones only when non-empty, and the recipient when one is configured.
 * `notifyRecipient` is seeded from the process config and no step edits it.
 */
export function buildWorkflowInputs(
  config: BuildConfig,
): Record<string, string> {
  const inputs: Record<string, string> = {};

  for (const field of REQUIRED_FIELDS) {
    inputs[WORKFLOW_INPUT_NAMES[field]] = config[field];
  }

  for (const field of OPTIONAL_FIELDS) {
    if (config[field]) {
      inputs[WORKFLOW_INPUT_NAMES[field]] = config[field];
    }
  }

  if (config.notifyRecipient) {
    inputs[RECIPIENT_INPUT_NAME] = config.notifyRecipient;
  }

  return inputs;
}
