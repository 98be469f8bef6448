// src/build/build.messages.ts
// Texts are sent with parse_mode 'Markdown' (legacy).
import { BuildConfig, BuildField } from './build-config';
import { BuildSession, BuildStep } from './build.state-machine';
import { ActiveBuild } from './active-build.store';
import { WorkflowRun } from '../github/github.types';

export const CONFIRM_ACTION = 'confirm_build';
export const CANCEL_ACTION = 'cancel_build';

const FIELD_LABELS: Record<BuildField, string> = {
  compiler: 'Compiler',
  kernelRepoUrl: 'Repository',
  kernelBranch: 'Branch',
  containerImage: 'Container',
  notes: 'Notes',
  suffix: 'Suffix',
  zipRepoUrl: 'AnyKernel Repository',
  zipBranch: 'AnyKernel Branch',
  kernelSuMode: 'KernelSU',
  notifyRecipient: 'Recipient',
};

export const code = (value: string) => '`' + value.replace(/`/g, "'") + '`';

const orNone = (value: string) => code(value || 'None');

/** Escapes free text placed outside entities. */
export const escapeMarkdown = (value: string) =>
  value.replace(/([_*`[])/g, '\\$1');

export function renderStepPrompt(config: BuildConfig, step: BuildStep): string {
  switch (step) {
    case BuildStep.AwaitingCompiler:
      return (
        `*Compiler* (current: ${code(config.compiler)})\n` +
        "Enter the compiler to use, or send 'default' to use the current value:"
      );
    case BuildStep.AwaitingKernelRepo:
      return (
        `*Kernel Repository* (current: ${code(config.kernelRepoUrl)})\n` +
        "Enter the kernel repository URL, or send 'default':"
      );
    case BuildStep.AwaitingKernelBranch:
      return (
        `*Kernel Branch* (current: ${code(config.kernelBranch)})\n` +
        "Enter the kernel branch, or send 'default':"
      );
    case BuildStep.AwaitingContainer:
      return (
        `*Container Image* (current: ${code(config.containerImage)})\n` +
        "Enter the container image, or send 'default':"
      );
    case BuildStep.AwaitingNotes:
      return (
        '*Optional Parameters*\n' +
        'The remaining parameters are optional.\n\n' +
        `*Notes* (current: ${orNone(config.notes)})\n` +
        "Enter notes for this build, send 'default' to keep the current value, or 'skip':"
      );
    case BuildStep.AwaitingKsuMode:
      return (
        `*KernelSU Patching* (current: ${orNone(config.kernelSuMode)})\n` +
        'Options:\n' +
        '• `both` - Build without and with KernelSU\n' +
        '• `sus` - Apply KernelSU and SuSFS patches\n' +
        '• `ksu` - Apply only KernelSU patches\n' +
        '• `skip` - No KernelSU patching\n\n' +
        'Enter your choice:'
      );
    case BuildStep.AwaitingConfirmation:
      return renderSummary(config);
    case BuildStep.Finished:
    case BuildStep.Cancelled:
      return '';
  }
}

export function renderStart(session: BuildSession): string {
  return (
    '🔧 *Starting Kernel Build Configuration*\n\n' +
    "I'll guide you through setting up your kernel build. " +
    'You can use default values or customize them. ' +
    'Send /cancel at any time to stop.\n\n' +
    renderStepPrompt(session.config, session.step)
  );
}

/** Echo of the value just accepted, followed by the next prompt. */
export function renderAdvance(session: BuildSession, field: BuildField): string {
  const accepted = `✅ ${FIELD_LABELS[field]}: ${orNone(session.config[field])}`;
  return `${accepted}\n\n${renderStepPrompt(session.config, session.step)}`;
}

export function renderSummary(config: BuildConfig): string {
  return (
    '🔍 *Build Configuration Summary*\n\n' +
    `*Compiler:* ${code(config.compiler)}\n` +
    `*Repository:* ${code(config.kernelRepoUrl)}\n` +
    `*Branch:* ${code(config.kernelBranch)}\n` +
    `*Container:* ${code(config.containerImage)}\n` +
    `*Notes:* ${orNone(config.notes)}\n` +
    `*KernelSU:* ${orNone(config.kernelSuMode)}\n\n` +
    'Is this configuration correct?'
  );
}

export const WELCOME_MESSAGE =
  '🔧 *Kernel Builder Bot*\n\n' +
  'Welcome! This bot helps you build custom kernels using GitHub Actions.\n\n' +
  'Available commands:\n' +
  '• /build - Start a new kernel build\n' +
  '• /status - Check build status\n' +
  '• /cancel - Cancel the build being configured\n' +
  '• /help - Show this help message\n\n' +
  'To get started, use /build to configure and start a new kernel build.';

export const HELP_MESSAGE =
  '🔧 *Kernel Builder Bot Help*\n\n' +
  '*Commands:*\n' +
  '• /start - Welcome message and overview\n' +
  '• /build - Start a new kernel build process\n' +
  '• /status - Check the status of your last build\n' +
  '• /cancel - Cancel the build being configured\n' +
  '• /help - Show this help message\n\n' +
  '*Build Process:*\n' +
  '1. Use /build to start\n' +
  '2. Configure build parameters (compiler, repo, branch, etc.)\n' +
  '3. Confirm your settings\n' +
  '4. Monitor the build progress with /status';

export const CANCELLED_MESSAGE = '❌ Build configuration cancelled.';
export const NOTHING_TO_CANCEL_MESSAGE =
  'Nothing to cancel. Use /build to start a new build.';
export const NO_BUILD_IN_PROGRESS_MESSAGE =
  'No build is being configured. Use /build to start a new build.';
export const ALREADY_DISPATCHING_MESSAGE =
  '⏳ Your build is already being started. Please wait.';
export const NO_ACTIVE_BUILD_MESSAGE =
  '❌ No active builds found. Use /build to start a new build.';

export const renderDispatchSuccess = (message: string) =>
  `🚀 *Build Started Successfully!*\n\n${escapeMarkdown(message)}`;

export const renderDispatchFailure = (message: string) =>
  `❌ *Build Failed to Start*\n\n${escapeMarkdown(message)}`;

const titleCase = (value: string) =>
  value
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');

/** `2026-10-18 09:05:00 UTC` */
export function formatStartedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function renderRunStatus(build: ActiveBuild, run: WorkflowRun): string {
  const conclusion = run.conclusion ? titleCase(run.conclusion) : 'In Progress';
  return (
    '📊 *Build Status*\n\n' +
    `*Started:* ${formatStartedAt(build.startedAt)}\n` +
    `*Status:* ${titleCase(run.status)}\n` +
    `*Conclusion:* ${conclusion}\n\n` +
    `[View on GitHub](${run.html_url})`
  );
}
