import { demoApp } from "./app";
import { Server } from "./Server";
import { createLogger } from "./utils/logger";

const server = new Server(demoApp, {
  host: process.env.HOST ?? "127.0.0.1",
  port: process.env.PORT ? Number(process.env.PORT) : 3000,
});

server.serve().catch((error: unknown) => {
  createLogger().fatal({ err: error }, "[server_failed]");
  process.exitCode = 1;
});
