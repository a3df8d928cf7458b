import { Module } from '@nestjs/common';
import { GitModule } from '../git/git.module';
import { LlmModule } from '../llm/llm.module';
import { ReviewController } from './review.controller';
import { ReviewService } from './review.service';

@Module({
  imports: [LlmModule, GitModule],
  controllers: [ReviewController],
  providers: [ReviewService],
  exports: [ReviewService],
})
export class ReviewModule {}
