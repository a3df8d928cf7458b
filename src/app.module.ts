import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ConfigModule as CoreConfigModule } from './modules/core/config/config.module';
import { GitModule } from './modules/git/git.module';
import { LlmModule } from './modules/llm/llm.module';
import { ReviewModule } from './modules/review/review.module';
import { WebhookModule } from './modules/webhook/webhook.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    CoreConfigModule,
    LlmModule,
    GitModule,
    ReviewModule,
    WebhookModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
