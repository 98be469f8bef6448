// src/build/build.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { SETTINGS, Settings } from '../config/settings';
import { GithubActionsService } from '../github/github-actions.service';
import { ACTIVE_BUILD_STORE, ActiveBuildStore } from './active-build.store';
import {
  BuildSession,
  BuildStep,
  isAwaiting,
  startBuild,
  transition,
} from './build.state-machine';
import {
  ALREADY_DISPATCHING_MESSAGE,
  CANCELLED_MESSAGE,
  NO_ACTIVE_BUILD_MESSAGE,
  NO_BUILD_IN_PROGRESS_MESSAGE,
  NOTHING_TO_CANCEL_MESSAGE,
  escapeMarkdown,
  renderAdvance,
  renderDispatchFailure,
  renderDispatchSuccess,
  renderRunStatus,
  renderStart,
  renderSummary,
} from './build.messages';

export interface BuildReply {
  text: string;
  /** Attach the confirm / cancel keyboard. */
  withConfirmation?: boolean;
}

export interface TurnResult {
  /** Session to keep for the next turn; undefined ends the conversation. */
  session?: BuildSession;
  reply: BuildReply;
}

@Injectable()
export class BuildService {
  private readonly logger = new Logger(BuildService.name);
  private readonly dispatching = new Set<number>();

  constructor(
    @Inject(SETTINGS) private readonly settings: Settings,
    @Inject(ACTIVE_BUILD_STORE) private readonly store: ActiveBuildStore,
    private readonly github: GithubActionsService,
  ) {}

  // ==================== CONVERSATION ====================

  /** Starts (or restarts) a conversation from the default record. */
  start(userId: number): TurnResult {
    const session = startBuild(userId, this.settings.defaults);
    this.logger.log(`Build configuration started by ${userId}`);
    return { session, reply: { text: renderStart(session) } };
  }

  reply(session: BuildSession | undefined, text: string): TurnResult {
    if (!session || !isAwaiting(session.step)) {
      return { reply: { text: NO_BUILD_IN_PROGRESS_MESSAGE } };
    }

    const result = transition(session, { type: 'text', text });
    const next = result.session;

    if (result.outcome.kind !== 'advanced') {
      // Text while the summary is shown: show it again
      return {
        session: next,
        reply: { text: renderSummary(next.config), withConfirmation: true },
      };
    }

    return {
      session: next,
      reply: {
        text: renderAdvance(next, result.outcome.field),
        withConfirmation: next.step === BuildStep.AwaitingConfirmation,
      },
    };
  }

  cancel(session: BuildSession | undefined): TurnResult {
    if (!session) {
      return { reply: { text: NOTHING_TO_CANCEL_MESSAGE } };
    }

    if (this.dispatching.has(session.userId)) {
      return { session, reply: { text: ALREADY_DISPATCHING_MESSAGE } };
    }

    const result = transition(session, { type: 'cancel' });
    if (result.outcome.kind !== 'cancelled') {
      return { reply: { text: NOTHING_TO_CANCEL_MESSAGE } };
    }

    this.logger.log(`Build configuration cancelled by ${session.userId}`);
    return { reply: { text: CANCELLED_MESSAGE } };
  }

  /**
   * Dispatches the finished config. One dispatch per user at a time; a
   * confirmation that arrives while one is pending is answered without
   * calling GitHub again.
   */
  async confirm(session: BuildSession | undefined): Promise<TurnResult> {
    if (!session) {
      return { reply: { text: NO_BUILD_IN_PROGRESS_MESSAGE } };
    }

    const { userId } = session;
    if (this.dispatching.has(userId)) {
      return { session, reply: { text: ALREADY_DISPATCHING_MESSAGE } };
    }

    const result = transition(session, { type: 'confirm' });
    if (result.outcome.kind !== 'confirmed') {
      return { session, reply: { text: NO_BUILD_IN_PROGRESS_MESSAGE } };
    }

    const { config } = result.session;
    this.dispatching.add(userId);
    try {
      const outcome = await this.github.dispatchWorkflow(config);

      if (!outcome.succeeded) {
        this.logger.warn(`Build for ${userId} failed to start`);
        return { reply: { text: renderDispatchFailure(outcome.message) } };
      }

      this.store.set(userId, {
        config,
        startedAt: new Date(),
        status: 'running',
      });
      this.logger.log(`🚀 Build started for ${userId}`);
      return { reply: { text: renderDispatchSuccess(outcome.message) } };
    } finally {
      this.dispatching.delete(userId);
    }
  }

  // ==================== STATUS ====================

  async status(userId: number): Promise<string> {
    const build = this.store.get(userId);
    if (!build) {
      return NO_ACTIVE_BUILD_MESSAGE;
    }

    const lookup = await this.github.getLatestRun();
    switch (lookup.kind) {
      case 'found':
        return renderRunStatus(build, lookup.run);
      case 'empty':
        return '❌ No workflow runs found.';
      case 'http-error':
        return `❌ Error fetching status: ${lookup.status}`;
      case 'error':
        return `❌ Error checking status: ${escapeMarkdown(lookup.message)}`;
    }
  }
}
