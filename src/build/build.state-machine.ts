// src/build/build.state-machine.ts
import {
  BuildConfig,
  BuildField,
  createBuildConfig,
  isOptionalField,
} from './build-config';

export enum BuildStep {
  AwaitingCompiler = 'awaiting_compiler',
  AwaitingKernelRepo = 'awaiting_kernel_repo',
  AwaitingKernelBranch = 'awaiting_kernel_branch',
  AwaitingContainer = 'awaiting_container',
  AwaitingNotes = 'awaiting_notes',
  AwaitingKsuMode = 'awaiting_ksu_mode',
  AwaitingConfirmation = 'awaiting_confirmation',
  Finished = 'finished',
  Cancelled = 'cancelled',
}

export type FieldStep =
  | BuildStep.AwaitingCompiler
  | BuildStep.AwaitingKernelRepo
  | BuildStep.AwaitingKernelBranch
  | BuildStep.AwaitingContainer
  | BuildStep.AwaitingNotes
  | BuildStep.AwaitingKsuMode;

interface FieldStepDefinition {
  field: BuildField;
  next: BuildStep;
}

export const FIELD_STEPS: Record<FieldStep, FieldStepDefinition> = {
  [BuildStep.AwaitingCompiler]: {
    field: 'compiler',
    next: BuildStep.AwaitingKernelRepo,
  },
  [BuildStep.AwaitingKernelRepo]: {
    field: 'kernelRepoUrl',
    next: BuildStep.AwaitingKernelBranch,
  },
  [BuildStep.AwaitingKernelBranch]: {
    field: 'kernelBranch',
    next: BuildStep.AwaitingContainer,
  },
  [BuildStep.AwaitingContainer]: {
    field: 'containerImage',
    next: BuildStep.AwaitingNotes,
  },
  [BuildStep.AwaitingNotes]: {
    field: 'notes',
    next: BuildStep.AwaitingKsuMode,
  },
  [BuildStep.AwaitingKsuMode]: {
    field: 'kernelSuMode',
    next: BuildStep.AwaitingConfirmation,
  },
};

export function isFieldStep(step: BuildStep): step is FieldStep {
  return step in FIELD_STEPS;
}

export function isAwaiting(step: BuildStep): boolean {
  return step !== BuildStep.Finished && step !== BuildStep.Cancelled;
}

export type FieldOverride = { kind: 'keep' } | { kind: 'set'; value: string };

export const KEEP: FieldOverride = { kind: 'keep' };

/**
 * Maps a free-text reply to an override. "default" keeps the current value,
 * "skip" (optional fields only) clears it. A blank reply never empties a
 * required field.
 */
export function parseFieldReply(
  field: BuildField,
  text: string,
): FieldOverride {
  const value = text.trim();
  const keyword = value.toLowerCase();

  if (keyword === 'default') return KEEP;

  if (isOptionalField(field)) {
    if (keyword === 'skip' || value === '') return { kind: 'set', value: '' };
    return { kind: 'set', value };
  }

  if (value === '') return KEEP;
  return { kind: 'set', value };
}

export function applyOverride(
  config: BuildConfig,
  field: BuildField,
  override: FieldOverride,
): BuildConfig {
  if (override.kind === 'keep') return config;
  return { ...config, [field]: override.value };
}

export interface BuildSession {
  userId: number;
  step: BuildStep;
  config: BuildConfig;
}

export type BuildEvent =
  | { type: 'text'; text: string }
  | { type: 'confirm' }
  | { type: 'cancel' };

export type TransitionOutcome =
  | { kind: 'advanced'; field: BuildField }
  | { kind: 'confirmed' }
  | { kind: 'cancelled' }
  | { kind: 'ignored' };

export interface TransitionResult {
  session: BuildSession;
  outcome: TransitionOutcome;
}

export function startBuild(userId: number, defaults: BuildConfig): BuildSession {
  return {
    userId,
    step: BuildStep.AwaitingCompiler,
    config: createBuildConfig(defaults),
  };
}

export function transition(
  session: BuildSession,
  event: BuildEvent,
): TransitionResult {
  const ignored: TransitionResult = { session, outcome: { kind: 'ignored' } };

  if (!isAwaiting(session.step)) return ignored;

  switch (event.type) {
    case 'cancel':
      return {
        session: { ...session, step: BuildStep.Cancelled },
        outcome: { kind: 'cancelled' },
      };

    case 'confirm':
      if (session.step !== BuildStep.AwaitingConfirmation) return ignored;
      return {
        session: { ...session, step: BuildStep.Finished },
        outcome: { kind: 'confirmed' },
      };

    case 'text': {
      if (!isFieldStep(session.step)) return ignored;
      const { field, next } = FIELD_STEPS[session.step];
      const override = parseFieldReply(field, event.text);
      return {
        session: {
          ...session,
          step: next,
          config: applyOverride(session.config, field, override),
        },
        outcome: { kind: 'advanced', field },
      };
    }
  }
}
