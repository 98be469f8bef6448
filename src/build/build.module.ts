import { Module } from '@nestjs/common';
import { GithubModule } from '../github/github.module';
import { BuildService } from './build.service';
import {
  ACTIVE_BUILD_STORE,
  InMemoryActiveBuildStore,
} from './active-build.store';

@Module({
  imports: [GithubModule],
  providers: [
    BuildService,
    { provide: ACTIVE_BUILD_STORE, useClass: InMemoryActiveBuildStore },
  ],
  exports: [BuildService],
})
export class BuildModule {}
