// backend/services/hero/src/db.ts
import mongoose from "mongoose";
import { logger } from "../../shared/utils/logger";

const redact = (uri: string) => uri.replace(/:\/\/.*@/, "://***:***@");

export async function connectDb(mongoUri: string): Promise<void> {
  try {
    await mongoose.connect(mongoUri);
    logger.info(
      { component: "mongodb", uri: redact(mongoUri) },
      "[MongoDB-hero] Connected"
    );
  } catch (err) {
    logger.error(
      {
        component: "mongodb",
        error: err instanceof Error ? err.message : String(err),
      },
      "[MongoDB-hero] Connection error"
    );
    throw err;
  }
}

export async function disconnectDb(): Promise<void> {
  await mongoose.disconnect();
  logger.info({ component: "mongodb" }, "[MongoDB-hero] Disconnected");
}

/** 1 = connected */
export function isDbReady(): boolean {
  return mongoose.connection.readyState === 1;
}
