import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class BindConfigDto {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  port!: number;
}

export class DocsConfigDto {
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @IsOptional()
  @IsString()
  @Matches(/^\/\S*$/, { message: 'path must start with "/"' })
  path?: string;
}

/**
 * One `hooks` entry
 */
export class HookConfigDto {
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsString()
  @IsNotEmpty()
  program!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  args?: string[];

  @IsOptional()
  @IsString()
  secret?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  timeout?: number;
}

/**
 * Shape of the YAML configuration file
 */
export class ServerConfigDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => BindConfigDto)
  bind?: BindConfigDto;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  socket?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  timeout?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  bodyLimit?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => DocsConfigDto)
  docs?: DocsConfigDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HookConfigDto)
  hooks!: HookConfigDto[];
}
