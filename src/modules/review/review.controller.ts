import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ManualReviewRequestDto } from './dto/review.dto';
import { ReviewService } from './review.service';
import { ReviewResult } from './review.types';

@Controller('review')
export class ReviewController {
  constructor(private readonly reviewService: ReviewService) {}

  /** Reviews a pull request without a triggering comment. */
  @Post('manual')
  @HttpCode(HttpStatus.OK)
  async reviewPullRequest(@Body() body: ManualReviewRequestDto): Promise<ReviewResult> {
    return this.reviewService.runReview({
      owner: body.owner,
      repo: body.repo,
      pullNumber: body.pullNumber,
      requestedBy: body.requestedBy ?? 'manual',
    });
  }
}
