// 1. 애플리케이션 진입점. 실행 담당.
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './module';

const corsAllowed = (process.env.CORS_ALLOWED_ORIGINS ?? '')
  .split(',')
  .map(s => s.trim())
  .filter(Boolean);

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.setGlobalPrefix(process.env.GLOBAL_PREFIX || 'v1');
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableCors({
    origin(origin, cb) {
      // 서버 간 통신은 origin이 없을 수 있음 → 허용
      if (!origin) return cb(null, true);

      // 정확히 일치하는 origin만 허용
      if (corsAllowed.includes(origin)) return cb(null, true);

      return cb(new Error('CORS blocked'), false);
    },
    allowedHeaders: ['Content-Type', 'x-admin-token'],
  });
  app.enableShutdownHooks();

  const port = Number(process.env.PORT || 4000);
  await app.listen(port);
  new Logger('Bootstrap').log(`API on http://localhost:${port}`);
}

bootstrap().catch(err => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
