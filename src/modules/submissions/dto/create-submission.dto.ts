import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SubmissionMetaDto {
  @ApiProperty({ description: 'Student identifier', example: 'stu-1042' })
  @IsString()
  @IsNotEmpty()
  studentRef!: string;

  @ApiPropertyOptional({
    description: 'Where to send the grade notification',
    example: 'student@example.com',
  })
  @IsOptional()
  @IsEmail()
  studentEmail?: string;

  @ApiProperty({ description: 'Assignment identifier', example: 'essay-3' })
  @IsString()
  @IsNotEmpty()
  assignmentRef!: string;

  @ApiProperty({ description: 'Course identifier', example: 'eng-101' })
  @IsString()
  @IsNotEmpty()
  courseRef!: string;
}

export class CreateSubmissionDto extends SubmissionMetaDto {
  @ApiProperty({
    description: 'Typed submission text',
    example: 'The cat sat on the mat.',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100_000)
  text!: string;
}
