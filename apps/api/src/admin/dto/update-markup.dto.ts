import { IsOptional, Matches, ValidateIf } from 'class-validator';

export class UpdateMarkupDto {
  // 생략하면 기본 마크업 변경
  @IsOptional()
  @Matches(/^[A-Za-z0-9]{2,10}\/[A-Za-z0-9]{2,10}$/)
  pair?: string;

  // pair가 있을 때 null이면 해당 쌍 설정 삭제
  @ValidateIf((o: UpdateMarkupDto) => o.percent !== null || o.pair === undefined)
  @Matches(/^\d+(\.\d+)?$/)
  percent!: string | null;
}
