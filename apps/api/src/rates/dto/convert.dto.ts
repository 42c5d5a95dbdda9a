import { IsNumberString, MaxLength } from 'class-validator';
import { GetPriceDto } from './get-price.dto';

export class ConvertDto extends GetPriceDto {
  // 양수/자릿수 검사는 변환 단계에서 (RATE_INVALID)
  @IsNumberString() @MaxLength(40) amount!: string;
}
