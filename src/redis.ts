import Redis from "ioredis";

import { configEnv } from "./config";

// ---------- Redis connection (single source) ----------
export function createRedisConnection(): Redis {
  // BullMQ workers need maxRetriesPerRequest: null for blocking commands
  const connection = configEnv.REDIS_URL
    ? new Redis(configEnv.REDIS_URL, {
        maxRetriesPerRequest: null,
        connectTimeout: 10000,
      })
    : new Redis({
        host: configEnv.REDIS_HOST,
        port: configEnv.REDIS_PORT,
        password: configEnv.REDIS_PASSWORD || undefined,
        maxRetriesPerRequest: null,
      });

  connection.on("connect", () => console.log("Connected to Redis"));
  connection.on("error", (err) => console.error("Redis error:", err.message));
  return connection;
}
