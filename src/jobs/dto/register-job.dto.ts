import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

export class RegisterJobDto {
  @IsString()
  @IsNotEmpty({ message: 'job name must not be empty' })
  @Matches(/^[A-Za-z0-9_.:-]+$/, {
    message: 'job name may only contain letters, digits and _ . : -',
  })
  name!: string;

  @IsString()
  @IsNotEmpty()
  schedule!: string;

  @IsString()
  description!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(10)
  retryCount?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  retryDelayMs?: number;

  @IsOptional()
  @IsBoolean()
  backfillAdvancesWatermark?: boolean;

  @IsOptional()
  @IsBoolean()
  backfillable?: boolean;
}
