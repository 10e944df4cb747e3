import { IsEnum, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { SubmissionState } from '../interfaces/submission.interface';

export class ListSubmissionsQueryDto {
  @ApiPropertyOptional({ enum: SubmissionState })
  @IsOptional()
  @IsEnum(SubmissionState)
  state?: SubmissionState;

  @ApiPropertyOptional({ example: 'eng-101' })
  @IsOptional()
  @IsString()
  courseRef?: string;

  @ApiPropertyOptional({ default: 50, maximum: 200 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;
}
