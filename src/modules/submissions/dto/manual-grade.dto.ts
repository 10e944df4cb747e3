import {
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ManualGradeDto {
  @ApiProperty({ description: 'Final score', minimum: 0, maximum: 100, example: 60 })
  @IsNumber()
  @Min(0)
  @Max(100)
  score!: number;

  @ApiProperty({ description: 'Instructor entering the grade', example: 'ins-7' })
  @IsString()
  @IsNotEmpty()
  instructorRef!: string;

  @ApiPropertyOptional({ description: 'Note kept with the grade' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  comment?: string;
}
