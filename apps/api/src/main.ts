import 'reflect-metadata';
import { loadEnv } from '@seva/config';
import { createApp, setupDocs } from './app.factory.js';

async function bootstrap() {
  const env = loadEnv(process.env);
  const app = await createApp();
  setupDocs(app);

  await app.listen(env.API_PORT, '0.0.0.0');
}

void bootstrap();
