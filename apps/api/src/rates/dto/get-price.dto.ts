import { IsIn, IsOptional, IsString, Length } from 'class-validator';
import type { Direction } from '../../quotes/types';

export class GetPriceDto {
  @IsString() @Length(2, 10) base!: string;
  @IsString() @Length(2, 10) quote!: string;

  @IsOptional()
  @IsIn(['buy', 'sell'])
  direction: Direction = 'buy';
}
