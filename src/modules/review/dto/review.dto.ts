import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

export class ManualReviewRequestDto {
  @IsString()
  @IsNotEmpty()
  owner!: string;

  @IsString()
  @IsNotEmpty()
  repo!: string;

  @IsInt()
  @Min(1)
  pullNumber!: number;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  requestedBy?: string;
}
