import { Type } from 'class-transformer';
import {
  IsDefined,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class GitHubUserDto {
  @IsString()
  @IsNotEmpty()
  login!: string;

  @IsString()
  @IsOptional()
  type?: string;
}

export class IssueCommentDto {
  @IsInt()
  @IsOptional()
  id?: number;

  @IsString()
  body!: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => GitHubUserDto)
  user!: GitHubUserDto;
}

export class IssueDto {
  @IsInt()
  @Min(1)
  number!: number;

  @IsString()
  @IsOptional()
  title?: string;

  /** Present only when the issue is a pull request. */
  @IsObject()
  @IsOptional()
  pull_request?: Record<string, unknown>;
}

export class RepositoryDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsOptional()
  full_name?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => GitHubUserDto)
  owner!: GitHubUserDto;
}

export class IssueCommentEventDto {
  @IsIn(['created', 'edited', 'deleted'])
  action!: 'created' | 'edited' | 'deleted';

  @IsDefined()
  @ValidateNested()
  @Type(() => IssueDto)
  issue!: IssueDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => IssueCommentDto)
  comment!: IssueCommentDto;

  @IsDefined()
  @ValidateNested()
  @Type(() => RepositoryDto)
  repository!: RepositoryDto;
}
