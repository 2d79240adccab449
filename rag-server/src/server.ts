import { createApp } from "./app";
import { env } from "./config/env";

const bootstrap = async () => {
  const { app, knowledgeBase, transportManager } = await createApp();

  const server = app.listen(env.port, () => {
    console.log(
      `Document knowledge base listening on http://localhost:${env.port}`
    );
    console.log(`Storage -> ${env.storagePath}`);
  });

  const shutdown = async () => {
    console.log("Shutting down knowledge base server...");
    server.close();
    await transportManager.closeAll();
    await knowledgeBase.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
};

bootstrap().catch((error) => {
  console.error("Failed to start knowledge base server:", error);
  process.exit(1);
});
