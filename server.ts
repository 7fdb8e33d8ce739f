import http from "http";

import { createApp } from "./src/app";
import { createServices } from "./src/bootstrap";
import { configEnv } from "./src/config";
import connectDB, { disconnectDB } from "./src/db";
import { attachChatSocket } from "./src/socket/chatSocket";

const startServer = async () => {
  const PORT = configEnv.PORT || 3000;

  // connect database
  await connectDB();

  const services = createServices();
  const app = createApp(services, {
    corsOrigins: configEnv.CORS_ORIGINS,
    maxUploadBytes: configEnv.MAX_UPLOAD_BYTES,
  });

  const server = http.createServer(app);
  const wss = attachChatSocket(server, services.chatManager);

  server.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
  });

  const shutdown = async (signal: string) => {
    console.log(`${signal} received, closing server`);
    try {
      await services.close();
      wss.close();
      server.close();
      await disconnectDB();
      process.exit(0);
    } catch (err) {
      console.error("Shutdown failed:", err);
      process.exit(1);
    }
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
};

startServer().catch((err) => {
  console.error("Server failed to start:", err);
  process.exit(1);
});
