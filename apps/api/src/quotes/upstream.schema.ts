import { z } from 'zod';

// 업스트림 응답 한 행. 필요한 필드만 검증하고 나머지는 통과
export const UpstreamRateRowSchema = z
  .object({
    symbol: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
    askPrice: z.number().finite(),
    bidPrice: z.number().finite(),
    close: z.number().finite(),
  })
  .passthrough();

// 행 단위 검증은 클라이언트에서 따로 하므로 data는 배열 여부만 본다
export const UpstreamRatesResponseSchema = z.object({
  data: z.array(z.unknown()),
  code: z.number().int(),
  message: z.string().default(''),
  isWorking: z.number().int(),
});

export type UpstreamRatesResponse = z.infer<typeof UpstreamRatesResponseSchema>;
