// src/build/active-build.store.ts
import { Injectable } from '@nestjs/common';
import { BuildConfig } from './build-config';

export const ACTIVE_BUILD_STORE = Symbol('ACTIVE_BUILD_STORE');

export interface ActiveBuild {
  config: BuildConfig;
  startedAt: Date;
  status: string;
}

/** Last successfully dispatched build per user. A later dispatch overwrites. */
export interface ActiveBuildStore {
  get(userId: number): ActiveBuild | undefined;
  set(userId: number, build: ActiveBuild): void;
}

@Injectable()
export class InMemoryActiveBuildStore implements ActiveBuildStore {
  private readonly builds = new Map<number, ActiveBuild>();

  get(userId: number): ActiveBuild | undefined {
    return this.builds.get(userId);
  }

  set(userId: number, build: ActiveBuild): void {
    this.builds.set(userId, build);
  }
}
