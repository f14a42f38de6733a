import { createApp } from './app.js';
import { config } from './config/index.js';
import { OspryClient } from './services/ospryClient.js';
import { InMemoryMetadataStore } from './store/metadataStore.js';

function startServer(): void {
  if (!config.ospry.secretKey || !config.ospry.publicKey) {
    console.error('Both OSPRY_SECRET_KEY and OSPRY_PUBLIC_KEY are required');
    process.exit(1);
  }

  const app = createApp({
    env: config.env,
    client: new OspryClient({
      key: config.ospry.secretKey,
      serverUrl: config.ospry.serverUrl,
    }),
    store: new InMemoryMetadataStore(),
    publicKey: config.ospry.publicKey,
    signedUrlTtlSeconds: config.demo.signedUrlTtlSeconds,
    maxUploadBytes: config.demo.maxUploadBytes,
  });

  app.listen(config.port, () => {
    console.log(`✓ Server running on http://localhost:${config.port}`);
    console.log(`  Environment: ${config.env}`);
    console.log(`  Images: http://localhost:${config.port}/images`);
  });
}

startServer();
