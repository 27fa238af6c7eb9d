import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { WsAdapter } from '@nestjs/platform-ws';
import { AppModule } from './app.module';
import { EnvConfig } from './config/env.config';
import { parseList } from './gateway/identity.util';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useWebSocketAdapter(new WsAdapter(app));

  const config = app.get(ConfigService<EnvConfig, true>);

  const allowedOrigins = parseList(config.get('ALLOWED_ORIGINS')).map((o) => o.replace(/\/+$/, ''));
  app.enableCors({
    origin: allowedOrigins,
    credentials: true,
  });

  const port = config.get('PORT');
  await app.listen(port);
  console.log(`Cable server listening on :${port}`);

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, async () => {
      console.log(`${sig} received, shutting down…`);
      await app.close();
      process.exit(0);
    });
  }
}

void bootstrap();
