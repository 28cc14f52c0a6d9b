import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsEnum, IsNotEmpty, IsOptional, IsString, IsUrl, MaxLength } from 'class-validator';
import { SourceType } from '../../../utils/types';

export class SubmitWebDocumentDto {
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  @MaxLength(2048)
  url!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(2048)
  displayName?: string;
}

export const MAX_BATCH_SIZE = 20;

export class SubmitWebDocumentsDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(MAX_BATCH_SIZE)
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true }, { each: true })
  @MaxLength(2048, { each: true })
  urls!: string[];
}

export class ListDocumentsQueryDto {
  @IsOptional()
  @IsEnum(SourceType)
  sourceType?: SourceType;
}
