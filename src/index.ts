import { appConfig, assertRuntimeConfig } from "./server/config.js";
import { createEmbeddingProvider } from "./server/embedding/openai-provider.js";
import { loadEntityStore } from "./server/entity/entity-store.js";
import { createApp } from "./server/http/app.js";
import { RepurposeService } from "./server/service.js";
import { logEvent } from "./server/telemetry.js";

async function main() {
  assertRuntimeConfig();

  const service = new RepurposeService({
    loadEntities: () => loadEntityStore(appConfig.dataPath),
    embeddings: createEmbeddingProvider(),
  });
  await service.initialize();

  const { host, port } = appConfig.server;
  const app = createApp(service);
  app.listen(port, host, () => {
    logEvent("info", "server.listening", { url: `http://${host}:${port}` });
  });
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
