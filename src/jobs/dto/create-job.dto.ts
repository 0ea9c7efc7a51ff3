import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
} from 'class-validator';
import { MAX_PATH_LENGTH } from '../../constants';
import {
  CreateJobInput,
  PROCESSING_KINDS,
  ProcessingKind,
  SettingsPayload,
} from '../interfaces/job.interface';

/**
 * Body of `POST /jobs`. The settings object is checked by the plugin for
 * `kind` when the job runs, not here.
 */
export class CreateJobDto implements CreateJobInput {
  @IsString()
  @IsNotEmpty({ message: 'sourceVideoPath is required' })
  @MaxLength(MAX_PATH_LENGTH)
  sourceVideoPath!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_PATH_LENGTH)
  outputPath?: string;

  @IsIn(PROCESSING_KINDS, {
    message: `kind must be one of: ${PROCESSING_KINDS.join(', ')}`,
  })
  kind!: ProcessingKind;

  @IsOptional()
  @IsObject()
  settings?: SettingsPayload;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  // Lets frame-based progress work for single-stage encodes
  @IsOptional()
  @IsInt()
  @IsPositive()
  totalFrames?: number;
}
