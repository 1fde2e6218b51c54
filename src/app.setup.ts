import { INestApplication, ValidationPipe } from '@nestjs/common';

/** Shared HTTP wiring for the server and the HTTP-level tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.enableCors();
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  return app;
}
