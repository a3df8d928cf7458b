import { Module } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import { INVOKER_CONFIG, InvokerConfig } from '../core/config';
import { GitHubClient } from './clients/github.client';
import { GIT_CLIENT } from './interfaces/git-client.interface';

@Module({
  providers: [
    {
      provide: GIT_CLIENT,
      inject: [INVOKER_CONFIG],
      useFactory: (config: InvokerConfig) =>
        new GitHubClient(
          new Octokit({
            auth: config.github.token,
            baseUrl: config.github.url,
          }),
        ),
    },
  ],
  exports: [GIT_CLIENT],
})
export class GitModule {}
