import { Inject, Injectable } from '@nestjs/common';
import { INVOKER_CONFIG, InvokerConfig } from './modules/core/config';

export interface ServiceStatus {
  service: string;
  status: 'running';
  timestamp: string;
  uptime: number;
  environment: string;
  platform: {
    node: string;
    platform: string;
    arch: string;
  };
  review: {
    provider: string;
    model?: string;
    triggerPhrase: string;
    llmKeyConfigured: boolean;
    githubTokenConfigured: boolean;
  };
}

@Injectable()
export class AppService {
  constructor(@Inject(INVOKER_CONFIG) private readonly config: InvokerConfig) {}

  getHealth(): { status: string; timestamp: string } {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  getStatus(): ServiceStatus {
    return {
      service: 'PR Review Invoker',
      status: 'running',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || 'development',
      platform: {
        node: process.version,
        platform: process.platform,
        arch: process.arch,
      },
      review: {
        provider: this.config.provider,
        model: this.config.model,
        triggerPhrase: this.config.triggerPhrase,
        llmKeyConfigured: !!this.config.apiKey,
        githubTokenConfigured: !!this.config.github.token,
      },
    };
  }
}
